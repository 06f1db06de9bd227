import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';

const packageRoot = new URL('../', import.meta.url);

describe('relpool bin', () => {
  it('should point at a node launcher that loads the TypeScript entry through tsx', async () => {
    const pkg: unknown = JSON.parse(await readFile(new URL('package.json', packageRoot), 'utf-8'));
    expect(pkg).toMatchObject({
      bin: { relpool: './bin/relpool.js' },
      dependencies: { tsx: expect.any(String) },
    });

    const launcher = await readFile(new URL('bin/relpool.js', packageRoot), 'utf-8');
    const lines = launcher.split('\n');

    expect(lines[0]).toBe('#!/usr/bin/env node');
    expect(lines).toContain("import { register } from 'tsx/esm/api';");
    expect(lines).toContain("await import('../src/index.ts');");
  });
});
