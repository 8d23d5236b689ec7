import { logger } from '../../utils/logger.js';
import { EmptyExtractionResult } from '../../utils/errors.js';
import { register } from '../registry/TermRegistry.js';
import { DEFAULT_MATCHERS, type LineCandidate, type LineMatcher, type MatchResult } from './matchers.js';
import { hasTerminologyXml, parseTerminologyXml } from './xml.js';
import type { TermRecord, TermSet } from '../../types/terms.types.js';

const HAN = /\p{Script=Han}/u;
const CODE_FENCE = /^```/;
const LIST_BULLET = /^[-*•]\s+/;
const PREVIEW_LENGTH = 200;
const MAX_TERM_LENGTH = 80;
const CLAUSE_END = /[：:。！？!?；;]$/;

const HEADER_WORDS = new Set([
  '序号',
  '中文',
  '英文',
  '术语',
  '中文术语',
  '英文术语',
  'chinese',
  'english',
  'chinese term',
  'english term',
  'zh',
  'en',
  'zh_cn',
  'en_us',
  'source',
  'target',
  'term',
]);

function isHeader(candidate: LineCandidate): boolean {
  return HEADER_WORDS.has(candidate.source.toLowerCase()) && HEADER_WORDS.has(candidate.target.toLowerCase());
}

function looksLikeTerm(value: string): boolean {
  return value.length <= MAX_TERM_LENGTH && !CLAUSE_END.test(value);
}

/**
 * A numbered row is taken as data whatever it contains. Without an ordinal the
 * line may be prose or a header, so it must read like a pair of terms.
 */
function accept(candidate: LineCandidate): boolean {
  const source = candidate.source.trim();
  const target = candidate.target.trim();
  if (!source || !target) return false;
  if (candidate.ordinal !== undefined) return true;
  if (isHeader(candidate)) return false;
  return HAN.test(source) && looksLikeTerm(source) && looksLikeTerm(target);
}

function toRecords(candidates: Iterable<LineCandidate>): TermRecord[] {
  const records: TermRecord[] = [];
  let lastIndex = 0;
  for (const candidate of candidates) {
    if (!accept(candidate)) continue;
    const sequenceIndex = candidate.ordinal ?? lastIndex + 1;
    records.push({ sequenceIndex, sourceTerm: candidate.source.trim(), targetTerm: candidate.target.trim() });
    lastIndex = sequenceIndex;
  }
  return records;
}

export function matchLine(line: string, matchers: readonly LineMatcher[] = DEFAULT_MATCHERS): MatchResult | null {
  for (const matcher of matchers) {
    const result = matcher.match(line);
    if (result) return result;
  }
  return null;
}

function* lineCandidates(rawText: string, matchers: readonly LineMatcher[]): Generator<LineCandidate> {
  let skipped = 0;
  for (const rawLine of rawText.split(/\r?\n/)) {
    const line = rawLine.trim().replace(LIST_BULLET, '');
    if (!line || CODE_FENCE.test(line)) continue;

    const result = matchLine(line, matchers);
    if (!result) {
      skipped++;
      continue;
    }
    if (result.kind === 'record') {
      yield result.candidate;
    }
  }
  if (skipped > 0) {
    logger.debug({ skipped }, 'Skipped unrecognized response lines');
  }
}

/**
 * Turns a model reply into a term set. Unrecognized lines are skipped; only a
 * reply without a single usable pair is an error.
 */
export function parseTerms(rawText: string, matchers: readonly LineMatcher[] = DEFAULT_MATCHERS): TermSet {
  let records: TermRecord[] = [];

  if (hasTerminologyXml(rawText)) {
    const xmlCandidates = parseTerminologyXml(rawText);
    if (xmlCandidates) {
      records = toRecords(xmlCandidates);
    }
  }

  if (records.length === 0) {
    records = toRecords(lineCandidates(rawText, matchers));
  }

  if (records.length === 0) {
    throw new EmptyExtractionResult(
      'Model response contained no recognizable term pairs',
      rawText.slice(0, PREVIEW_LENGTH)
    );
  }

  const terms = register(records);
  logger.info({ parsed: records.length, unique: terms.length }, 'Parsed term pairs from model response');
  return terms;
}
