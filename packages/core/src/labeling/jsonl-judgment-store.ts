/**
 * Append-only JSON Lines judgment store.
 *
 * Every write appends one line immediately, so an interrupted labeling run
 * keeps all judgments that settled before the interruption. On open, the
 * last line for a (query, docId) wins.
 */

import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import { JudgmentStoreError } from '../types/errors.js';
import type { JudgmentStore, RelevanceGrade, RelevanceJudgment } from '../types/judgment.js';
import { relevanceJudgmentSchema } from './judgment-schema.js';
import { InMemoryJudgmentStore } from './judgment-store.js';

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class JsonlJudgmentStore implements JudgmentStore {
  private readonly filePath: string;
  private readonly cache: InMemoryJudgmentStore;
  private readonly malformed: number;
  /** The file ends in a partial line; the next append must start on a fresh one. */
  private unterminated: boolean;
  private tail: Promise<void> = Promise.resolve();

  private constructor(
    filePath: string,
    cache: InMemoryJudgmentStore,
    malformed: number,
    unterminated: boolean,
  ) {
    this.filePath = filePath;
    this.cache = cache;
    this.malformed = malformed;
    this.unterminated = unterminated;
  }

  /**
   * Load an existing judgments file, or start an empty one when it does not exist.
   */
  static async open(filePath: string): Promise<Result<JsonlJudgmentStore, JudgmentStoreError>> {
    let content = '';
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        const message = error instanceof Error ? error.message : String(error);
        return err(new JudgmentStoreError(`Failed to read judgments file ${filePath}: ${message}`));
      }
      try {
        await mkdir(dirname(filePath), { recursive: true });
      } catch (mkdirError: unknown) {
        const message = mkdirError instanceof Error ? mkdirError.message : String(mkdirError);
        return err(new JudgmentStoreError(`Failed to create directory for ${filePath}: ${message}`));
      }
    }

    const judgments: RelevanceJudgment[] = [];
    let malformed = 0;
    for (const line of content.split('\n')) {
      if (line.trim().length === 0) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        malformed++;
        continue;
      }
      const validated = relevanceJudgmentSchema.safeParse(parsed);
      if (validated.success) {
        judgments.push(validated.data);
      } else {
        malformed++;
      }
    }

    const unterminated = content.length > 0 && !content.endsWith('\n');
    return ok(
      new JsonlJudgmentStore(filePath, new InMemoryJudgmentStore(judgments), malformed, unterminated),
    );
  }

  get path(): string {
    return this.filePath;
  }

  /** Lines skipped on open because they were not valid judgments. */
  get malformedLines(): number {
    return this.malformed;
  }

  get size(): number {
    return this.cache.size;
  }

  async read(query: string, docId: string): Promise<RelevanceGrade | undefined> {
    return this.cache.read(query, docId);
  }

  async get(query: string, docId: string): Promise<RelevanceJudgment | undefined> {
    return this.cache.get(query, docId);
  }

  all(): RelevanceJudgment[] {
    return this.cache.all();
  }

  async write(judgment: RelevanceJudgment): Promise<Result<void, JudgmentStoreError>> {
    const line = JSON.stringify(judgment) + '\n';
    // Appends run one at a time; a failed append is reported to its own caller
    // and must not block the ones queued behind it.
    const append = this.tail.then(async () => {
      await appendFile(this.filePath, this.unterminated ? '\n' + line : line, 'utf-8');
      this.unterminated = false;
    });
    this.tail = append.then(
      () => undefined,
      () => undefined,
    );

    try {
      await append;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      return err(new JudgmentStoreError(`Failed to append judgment to ${this.filePath}: ${message}`));
    }

    return this.cache.write(judgment);
  }
}
