/**
 * Timezone abbreviation table.
 *
 * Abbreviations are not standardized: "CST" is Central Standard Time in North
 * America, China Standard Time and Cuba Standard Time. The reference dataset
 * keeps every real-world meaning, and the table collapses them to a single
 * offset using an explicit precedence map, never file order.
 */

import { parseFail, parseOk, type ParseResult } from '../errors/parseError.js';
import { formatUtcOffset, parseUtcOffset } from './offset.js';
import type { AbbreviationEntry, UtcOffset } from './types.js';

/**
 * Immutable abbreviation → entry map. Built once at startup and shared by
 * reference; nothing mutates it afterwards.
 */
export type AbbreviationTable = ReadonlyMap<string, AbbreviationEntry>;

/**
 * Canonical offset token (e.g. "UTC−06") for each abbreviation that the
 * dataset lists with more than one offset.
 */
export type AbbreviationPrecedence = Readonly<Record<string, string>>;

/**
 * Raised while building the table. The dataset ships with the deployment, so
 * this is a startup failure rather than a request error.
 */
export class AbbreviationTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbbreviationTableError';
  }
}

const ABBREVIATION_PATTERN = /^[A-Z]+$/;
const OFFSET_PREFIX = 'UTC';

/**
 * Parses an offset field such as "UTC+05:30" or "UTC±00".
 *
 * @throws AbbreviationTableError if the field lacks the prefix or the token is invalid
 */
function parseOffsetField(field: string, where: string): UtcOffset {
  if (!field.startsWith(OFFSET_PREFIX)) {
    throw new AbbreviationTableError(`${where}: offset "${field}" must start with "${OFFSET_PREFIX}"`);
  }

  const result = parseUtcOffset(field.slice(OFFSET_PREFIX.length));
  if (!result.success) {
    throw new AbbreviationTableError(`${where}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Parses the reference dataset: one `ABBR <tab> label <tab> UTC<offset>` entry
 * per line. Blank lines and lines starting with '#' are skipped.
 *
 * @param source - Full text of the dataset
 * @returns Entries in file order, duplicates included
 * @throws AbbreviationTableError naming the first malformed line
 */
export function parseAbbreviationSource(source: string): AbbreviationEntry[] {
  const entries: AbbreviationEntry[] = [];
  const lines = source.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const line = index + 1;
    const trimmed = rawLine.trim();
    if (trimmed === '' || trimmed.startsWith('#')) {
      return;
    }

    const fields = rawLine.split('\t').map((field) => field.trim());
    if (fields.length !== 3) {
      throw new AbbreviationTableError(
        `line ${line}: expected "ABBR<tab>label<tab>UTC<offset>", got ${fields.length} field(s)`,
      );
    }

    const [abbreviation, label, offsetField] = fields;
    if (!ABBREVIATION_PATTERN.test(abbreviation)) {
      throw new AbbreviationTableError(`line ${line}: abbreviation "${abbreviation}" must be uppercase letters`);
    }
    if (label === '') {
      throw new AbbreviationTableError(`line ${line}: label for "${abbreviation}" is empty`);
    }

    entries.push({
      abbreviation,
      label,
      offset: parseOffsetField(offsetField, `line ${line}`),
      line,
    });
  });

  return entries;
}

/**
 * Collapses parsed entries into the lookup table.
 *
 * Precedence rule:
 * - entries that agree on the offset collapse to the first of them;
 * - an abbreviation listed with different offsets must appear in
 *   `precedence`, and the entry whose offset equals the named one wins;
 * - a precedence entry must match one of its abbreviation's entries.
 *
 * @throws AbbreviationTableError on any unresolved or inconsistent duplicate
 */
export function buildAbbreviationTable(
  entries: readonly AbbreviationEntry[],
  precedence: AbbreviationPrecedence = {},
): AbbreviationTable {
  const groups = new Map<string, AbbreviationEntry[]>();
  for (const entry of entries) {
    const group = groups.get(entry.abbreviation);
    if (group === undefined) {
      groups.set(entry.abbreviation, [entry]);
    } else {
      group.push(entry);
    }
  }

  for (const abbreviation of Object.keys(precedence)) {
    if (!groups.has(abbreviation)) {
      throw new AbbreviationTableError(`precedence entry "${abbreviation}" does not appear in the dataset`);
    }
  }

  const table = new Map<string, AbbreviationEntry>();
  for (const [abbreviation, group] of groups) {
    const preferredToken = precedence[abbreviation];

    if (preferredToken === undefined) {
      const distinct = new Set(group.map((entry) => entry.offset));
      if (distinct.size > 1) {
        const listing = group
          .map((entry) => `UTC${formatUtcOffset(entry.offset)} on line ${entry.line}`)
          .join(', ');
        throw new AbbreviationTableError(
          `abbreviation "${abbreviation}" is ambiguous (${listing}) and has no precedence entry`,
        );
      }
      table.set(abbreviation, group[0]);
      continue;
    }

    const preferred = parseOffsetField(preferredToken, `precedence entry "${abbreviation}"`);
    const chosen = group.find((entry) => entry.offset === preferred);
    if (chosen === undefined) {
      throw new AbbreviationTableError(
        `precedence entry "${abbreviation}" names ${preferredToken}, which matches none of its dataset entries`,
      );
    }
    table.set(abbreviation, chosen);
  }

  return table;
}

/**
 * Looks up an abbreviation. Matching is exact and case-sensitive.
 *
 * @example
 * lookupAbbreviation(table, 'JST')     // { success: true, data: 32400 }
 * lookupAbbreviation(table, 'INVALID') // { success: false, error: ParseError('unknown-abbreviation') }
 */
export function lookupAbbreviation(
  table: AbbreviationTable,
  abbreviation: string,
): ParseResult<UtcOffset> {
  const entry = table.get(abbreviation);
  if (entry === undefined) {
    return parseFail('unknown-abbreviation', `Unknown timezone abbreviation: ${abbreviation}`);
  }
  return parseOk(entry.offset);
}
