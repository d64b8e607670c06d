import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { lookupAbbreviation, type AbbreviationTable } from './abbreviations.js';
import { DEFAULT_ABBREVIATIONS_PATH, DEFAULT_PRECEDENCE_PATH, loadAbbreviationTable } from './loader.js';

describe('default dataset paths', () => {
  it('point at the data directory of the package root', () => {
    expect(DEFAULT_ABBREVIATIONS_PATH).toBe(fileURLToPath(new URL('../../data/abbreviations.tsv', import.meta.url)));
    expect(DEFAULT_PRECEDENCE_PATH).toBe(
      fileURLToPath(new URL('../../data/abbreviation-precedence.json', import.meta.url)),
    );
  });
});

describe('loadAbbreviationTable with the bundled dataset', () => {
  let table: AbbreviationTable;

  beforeAll(async () => {
    table = await loadAbbreviationTable();
  });

  it('maps CST to North American Central Standard Time', () => {
    expect(lookupAbbreviation(table, 'CST')).toEqual({ success: true, data: -21600 });
  });

  it('maps JST to UTC+9', () => {
    expect(lookupAbbreviation(table, 'JST')).toEqual({ success: true, data: 32400 });
  });

  it('maps UTC and GMT to zero', () => {
    expect(lookupAbbreviation(table, 'UTC')).toEqual({ success: true, data: 0 });
    expect(lookupAbbreviation(table, 'GMT')).toEqual({ success: true, data: 0 });
  });

  it('applies the precedence map to other ambiguous abbreviations', () => {
    expect(table.get('IST')?.offset).toBe(19800);
    expect(table.get('BST')?.offset).toBe(3600);
    expect(table.get('AST')?.offset).toBe(-14400);
    expect(table.get('PST')?.offset).toBe(-28800);
  });

  it('keeps fractional-hour offsets', () => {
    expect(table.get('NPT')?.offset).toBe(20700);
    expect(table.get('CHAST')?.offset).toBe(45900);
    expect(table.get('MART')?.offset).toBe(-34200);
  });

  it('holds one entry per distinct abbreviation', () => {
    expect(table.size).toBe(190);
  });

  it('rejects unknown abbreviations', () => {
    const result = lookupAbbreviation(table, 'INVALID');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe('unknown-abbreviation');
    }
  });
});

describe('loadAbbreviationTable with custom files', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'abbreviations-'));
    await writeFile(join(dir, 'ok.tsv'), 'AAA\tFirst\tUTC+01\nAAA\tSecond\tUTC+02\n');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('builds a table from the given paths', async () => {
    const sourcePath = join(dir, 'ok.tsv');
    const precedencePath = join(dir, 'ok.json');
    await writeFile(precedencePath, '{ "AAA": "UTC+02" }');

    const table = await loadAbbreviationTable({ sourcePath, precedencePath });
    expect(table.get('AAA')?.label).toBe('Second');
  });

  it('prefixes dataset errors with the file path', async () => {
    const sourcePath = join(dir, 'bad.tsv');
    const precedencePath = join(dir, 'empty.json');
    await writeFile(sourcePath, 'AAA\tFirst\n');
    await writeFile(precedencePath, '{}');

    await expect(loadAbbreviationTable({ sourcePath, precedencePath })).rejects.toThrow(
      `${sourcePath}: line 1: expected "ABBR<tab>label<tab>UTC<offset>", got 2 field(s)`,
    );
  });

  it('rejects a precedence file that is not valid JSON', async () => {
    const sourcePath = join(dir, 'ok.tsv');
    const precedencePath = join(dir, 'broken.json');
    await writeFile(precedencePath, '{ "AAA": ');

    await expect(loadAbbreviationTable({ sourcePath, precedencePath })).rejects.toThrow(
      `${precedencePath}: invalid JSON`,
    );
  });

  it('rejects a precedence file with values of the wrong shape', async () => {
    const sourcePath = join(dir, 'ok.tsv');
    const precedencePath = join(dir, 'shape.json');
    await writeFile(precedencePath, '{ "AAA": 2 }');

    await expect(loadAbbreviationTable({ sourcePath, precedencePath })).rejects.toThrow(precedencePath);
  });
});
