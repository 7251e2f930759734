import {
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { getTemporaryPath, writeFileAtomic } from './atomic-file-writer';

describe('writeFileAtomic', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'atomic-writer-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  test('should create a new file', () => {
    const target = join(workDir, 'report.json');

    writeFileAtomic(target, '{"a":1}');

    expect(readFileSync(target, 'utf-8')).toBe('{"a":1}');
    expect(readdirSync(workDir)).toEqual(['report.json']);
  });

  test('should replace an existing file', () => {
    const target = join(workDir, 'report.json');
    writeFileSync(target, 'old');

    writeFileAtomic(target, 'new');

    expect(readFileSync(target, 'utf-8')).toBe('new');
    expect(readdirSync(workDir)).toEqual(['report.json']);
  });

  test('should rethrow when the directory does not exist', () => {
    const target = join(workDir, 'missing', 'report.json');

    expect(() => writeFileAtomic(target, 'data')).toThrow();
    expect(readdirSync(workDir)).toEqual([]);
  });

  test('should remove the temporary file when the rename fails', () => {
    // A non-empty directory cannot be replaced by a file
    const target = join(workDir, 'occupied');
    mkdirSync(target);
    writeFileSync(join(target, 'keep.txt'), 'keep');

    expect(() => writeFileAtomic(target, 'data')).toThrow();
    expect(readdirSync(workDir)).toEqual(['occupied']);
    expect(readFileSync(join(target, 'keep.txt'), 'utf-8')).toBe('keep');
  });
});

describe('getTemporaryPath', () => {
  test('should place the temporary file beside the target', () => {
    const temporaryPath = getTemporaryPath('/reports/monthly.json');

    expect(temporaryPath.startsWith('/reports/.monthly.json.')).toBe(true);
    expect(temporaryPath.endsWith('.tmp')).toBe(true);
  });
});
