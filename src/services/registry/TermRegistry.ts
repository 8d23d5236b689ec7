import { randomInt } from 'crypto';
import { logger } from '../../utils/logger.js';
import type { IdMode, OutputRow, TermRecord, TermSet } from '../../types/terms.types.js';

const TOKEN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const DEFAULT_TOKEN_LENGTH = 6;

function pairKey(record: TermRecord): string {
  return `${record.sourceTerm}\u0000${record.targetTerm}`;
}

/**
 * Order-preserving dedupe on the (source, target) pair. The first occurrence
 * wins, so registering an already registered set returns it unchanged.
 */
export function register(candidates: Iterable<TermRecord>): TermSet {
  const seen = new Set<string>();
  const terms: TermRecord[] = [];
  let duplicates = 0;

  for (const candidate of candidates) {
    const key = pairKey(candidate);
    if (seen.has(key)) {
      duplicates++;
      continue;
    }
    seen.add(key);
    terms.push(candidate);
  }

  if (duplicates > 0) {
    logger.debug({ kept: terms.length, duplicates }, 'Dropped duplicate term pairs');
  }

  return terms;
}

export function randomToken(length: number = DEFAULT_TOKEN_LENGTH): string {
  let token = '';
  for (let i = 0; i < length; i++) {
    token += TOKEN_ALPHABET[randomInt(TOKEN_ALPHABET.length)];
  }
  return token;
}

/**
 * Random tokens are unique within the batch only; nothing is checked against
 * files written by earlier runs.
 */
export function assignIds(
  termSet: TermSet,
  mode: IdMode,
  tokenLength: number = DEFAULT_TOKEN_LENGTH,
  nextToken: (length: number) => string = randomToken
): OutputRow[] {
  if (mode === 'sequential') {
    return termSet.map((term, i) => ({ id: String(i + 1), zh: term.sourceTerm, en: term.targetTerm }));
  }

  const tokenSpace = Math.pow(TOKEN_ALPHABET.length, tokenLength);
  if (termSet.length > tokenSpace) {
    throw new RangeError(`Cannot assign ${termSet.length} unique ${tokenLength}-character tokens`);
  }

  const used = new Set<string>();
  return termSet.map(term => {
    let token = nextToken(tokenLength);
    while (used.has(token)) {
      token = nextToken(tokenLength);
    }
    used.add(token);
    return { id: token, zh: term.sourceTerm, en: term.targetTerm };
  });
}
