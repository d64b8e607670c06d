import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import {
  AbbreviationTableError,
  buildAbbreviationTable,
  parseAbbreviationSource,
  type AbbreviationPrecedence,
  type AbbreviationTable,
} from './abbreviations.js';

/**
 * Root of the installed package. Resolved through the package name so the
 * data directory is found from both the sources and the compiled output.
 */
const PACKAGE_ROOT = dirname(createRequire(import.meta.url).resolve('@time-banner/core/package.json'));

/**
 * Default dataset shipped with the package.
 */
export const DEFAULT_ABBREVIATIONS_PATH = join(PACKAGE_ROOT, 'data', 'abbreviations.tsv');

/**
 * Default precedence map shipped with the package.
 */
export const DEFAULT_PRECEDENCE_PATH = join(PACKAGE_ROOT, 'data', 'abbreviation-precedence.json');

/**
 * Schema for the precedence file: `{ "CST": "UTC−06", ... }`.
 */
export const abbreviationPrecedenceSchema: z.ZodType<AbbreviationPrecedence> = z.record(
  z.string().regex(/^[A-Z]+$/, 'abbreviation must be uppercase letters'),
  z.string().startsWith('UTC'),
);

export interface LoadAbbreviationTableOptions {
  /** Path of the tab-separated dataset */
  sourcePath?: string;
  /** Path of the precedence JSON */
  precedencePath?: string;
}

/**
 * Reads the dataset and precedence map from disk and builds the table.
 * Call once at startup; the result is immutable and safe to share.
 *
 * @throws AbbreviationTableError if either file is malformed
 */
export async function loadAbbreviationTable(
  options: LoadAbbreviationTableOptions = {},
): Promise<AbbreviationTable> {
  const sourcePath = options.sourcePath ?? DEFAULT_ABBREVIATIONS_PATH;
  const precedencePath = options.precedencePath ?? DEFAULT_PRECEDENCE_PATH;

  const [source, rawPrecedence] = await Promise.all([
    readFile(sourcePath, 'utf8'),
    readFile(precedencePath, 'utf8'),
  ]);

  let json: unknown;
  try {
    json = JSON.parse(rawPrecedence);
  } catch (error) {
    throw new AbbreviationTableError(
      `${precedencePath}: invalid JSON (${error instanceof Error ? error.message : String(error)})`,
    );
  }

  const precedence = abbreviationPrecedenceSchema.safeParse(json);
  if (!precedence.success) {
    throw new AbbreviationTableError(`${precedencePath}: ${precedence.error.message}`);
  }

  try {
    return buildAbbreviationTable(parseAbbreviationSource(source), precedence.data);
  } catch (error) {
    if (error instanceof AbbreviationTableError) {
      throw new AbbreviationTableError(`${sourcePath}: ${error.message}`);
    }
    throw error;
  }
}
