export interface LineCandidate {
  ordinal?: number;
  source: string;
  target: string;
}

export type MatchResult = { kind: 'record'; candidate: LineCandidate } | { kind: 'separator' };

export interface LineMatcher {
  name: string;
  match(line: string): MatchResult | null;
}

const ORDINAL_FIELD = /^\(?\s*(\d{1,6})\s*[.)、:：]?\s*\)?$/;
const ORDINAL_PREFIXES = [/^\(\s*(\d{1,6})\s*\)\s*/, /^(\d{1,6})[.)、:：](?!\d)\s*/, /^(\d{1,6})\s+/];
const TABLE_SEPARATOR = /^[\s|:-]+$/;

export function parseOrdinalField(field: string): number | undefined {
  const match = ORDINAL_FIELD.exec(field.trim());
  return match?.[1] ? parseInt(match[1], 10) : undefined;
}

export function splitOrdinalPrefix(field: string): { ordinal?: number; rest: string } {
  const trimmed = field.trim();
  for (const pattern of ORDINAL_PREFIXES) {
    const match = pattern.exec(trimmed);
    if (match?.[1]) {
      return { ordinal: parseInt(match[1], 10), rest: trimmed.slice(match[0].length) };
    }
  }
  return { rest: trimmed };
}

/** Trims and drops markdown emphasis or code quoting around a cell. */
export function cleanField(field: string): string {
  let value = field.trim();
  for (const wrapper of ['**', '__', '`']) {
    if (value.length > wrapper.length * 2 && value.startsWith(wrapper) && value.endsWith(wrapper)) {
      value = value.slice(wrapper.length, -wrapper.length).trim();
    }
  }
  return value;
}

function record(candidate: LineCandidate): MatchResult | null {
  if (!candidate.source || !candidate.target) return null;
  return { kind: 'record', candidate };
}

/** Cells of a delimited row: `ordinal, source, target` or `[ordinal] source, target`. */
export function fromCells(rawCells: string[]): MatchResult | null {
  const cells = rawCells.map(cleanField);

  if (cells.length >= 3) {
    const ordinal = parseOrdinalField(cells[0] ?? '');
    if (ordinal === undefined) return null;
    return record({ ordinal, source: cells[1] ?? '', target: cells[2] ?? '' });
  }

  if (cells.length === 2) {
    const { ordinal, rest } = splitOrdinalPrefix(cells[0] ?? '');
    return record({ ordinal, source: cleanField(rest), target: cells[1] ?? '' });
  }

  return null;
}

function trimEdgeCells(cells: string[]): string[] {
  const result = [...cells];
  if (result.length > 0 && result[0]?.trim() === '') result.shift();
  if (result.length > 0 && result[result.length - 1]?.trim() === '') result.pop();
  return result;
}

export const markdownTableMatcher: LineMatcher = {
  name: 'markdown-table',
  match(line) {
    if (!line.startsWith('|')) return null;
    if (TABLE_SEPARATOR.test(line) && line.includes('-')) {
      return { kind: 'separator' };
    }
    return fromCells(trimEdgeCells(line.split('|')));
  },
};

export const pipeMatcher: LineMatcher = {
  name: 'pipe',
  match(line) {
    if (!line.includes('|')) return null;
    return fromCells(trimEdgeCells(line.split('|')));
  },
};

export const tabMatcher: LineMatcher = {
  name: 'tab',
  match(line) {
    if (!line.includes('\t')) return null;
    return fromCells(trimEdgeCells(line.split('\t')));
  },
};

const LEADING_ORDINAL_FIELD = /^\(?\s*(\d{1,6})\s*[.)]?\s*\)?\s*[,，]\s*/;
const FIRST_COMMA = /\s*[,，]\s*/;

/**
 * Only the first comma after the ordinal separates the two terms, so an English
 * term keeps any commas of its own.
 */
export const commaMatcher: LineMatcher = {
  name: 'comma',
  match(line) {
    if (!FIRST_COMMA.test(line)) return null;

    let ordinal: number | undefined;
    let rest = line;
    const leading = LEADING_ORDINAL_FIELD.exec(line);
    if (leading?.[1]) {
      ordinal = parseInt(leading[1], 10);
      rest = line.slice(leading[0].length);
    } else {
      const prefixed = splitOrdinalPrefix(line);
      ordinal = prefixed.ordinal;
      rest = prefixed.rest;
    }

    const split = FIRST_COMMA.exec(rest);
    if (!split) return null;
    return record({
      ordinal,
      source: cleanField(rest.slice(0, split.index)),
      target: cleanField(rest.slice(split.index + split[0].length)),
    });
  },
};

/** Tried in order; the first matcher that recognizes a line wins. */
export const DEFAULT_MATCHERS: readonly LineMatcher[] = [
  markdownTableMatcher,
  pipeMatcher,
  tabMatcher,
  commaMatcher,
];
