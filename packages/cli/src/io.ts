/**
 * File and argument helpers shared by the CLI commands.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { ConfigurationError, parsePooledTable } from '@relpool/core';
import type { PooledTable, RawHitRow } from '@relpool/core';

const hitFileSchema = z.union([
  z.array(z.record(z.string(), z.unknown())),
  z.object({ hits: z.array(z.record(z.string(), z.unknown())) }).transform((file) => file.hits),
]);

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function readJsonFile(path: string): Promise<Result<unknown, ConfigurationError>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error: unknown) {
    return err(new ConfigurationError(`Cannot read ${path}: ${errorMessage(error)}`));
  }
  try {
    const parsed: unknown = JSON.parse(content);
    return ok(parsed);
  } catch (error: unknown) {
    return err(new ConfigurationError(`Invalid JSON in ${path}: ${errorMessage(error)}`));
  }
}

/**
 * Read one method's results: a JSON array of hit rows, or `{ "hits": [...] }`.
 */
export async function readHitFile(path: string): Promise<Result<RawHitRow[], ConfigurationError>> {
  const json = await readJsonFile(path);
  if (json.isErr()) return err(json.error);

  const parsed = hitFileSchema.safeParse(json.value);
  if (!parsed.success) {
    return err(
      new ConfigurationError(`${path}: expected an array of hit objects or { "hits": [...] }`),
    );
  }
  return ok(parsed.data);
}

export async function readPooledTable(path: string): Promise<Result<PooledTable, ConfigurationError>> {
  const json = await readJsonFile(path);
  if (json.isErr()) return err(json.error);

  return parsePooledTable(json.value).mapErr(
    (error) => new ConfigurationError(`${path}: ${error.message}`),
  );
}

/** Write a text file, creating parent directories as needed. */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf-8');
}

export function parsePositiveInt(value: string, flag: string): Result<number, ConfigurationError> {
  const parsed = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (isNaN(parsed) || parsed < 1) {
    return err(new ConfigurationError(`Invalid ${flag} value "${value}". Must be a positive integer.`));
  }
  return ok(parsed);
}

export function parseNonNegativeInt(value: string, flag: string): Result<number, ConfigurationError> {
  const parsed = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (isNaN(parsed)) {
    return err(new ConfigurationError(`Invalid ${flag} value "${value}". Must be a non-negative integer.`));
  }
  return ok(parsed);
}

/** Parse a comma-separated list of positive integers such as `5,10,20`. */
export function parseCutoffList(value: string): Result<number[], ConfigurationError> {
  const cutoffs: number[] = [];
  for (const part of value.split(',')) {
    const parsed = parsePositiveInt(part, '--cutoffs');
    if (parsed.isErr()) return err(parsed.error);
    cutoffs.push(parsed.value);
  }
  return ok(cutoffs);
}

/** Parse a comma-separated list of names, dropping blanks. */
export function parseNameList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export interface RunSpec {
  readonly partition: string | null;
  readonly method: string;
  readonly path: string;
}

/**
 * Parse `--run` values of the form `[partition:]method=path`.
 */
export function parseRunSpec(value: string): Result<RunSpec, ConfigurationError> {
  const eq = value.indexOf('=');
  if (eq <= 0 || eq === value.length - 1) {
    return err(
      new ConfigurationError(`Invalid --run value "${value}". Expected [partition:]method=path.`),
    );
  }
  const target = value.slice(0, eq);
  const path = value.slice(eq + 1);
  const colon = target.indexOf(':');
  if (colon === -1) {
    return ok({ partition: null, method: target, path });
  }

  const partition = target.slice(0, colon);
  const method = target.slice(colon + 1);
  if (partition.length === 0 || method.length === 0) {
    return err(
      new ConfigurationError(`Invalid --run value "${value}". Expected [partition:]method=path.`),
    );
  }
  return ok({ partition, method, path });
}
