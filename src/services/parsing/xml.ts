import { XMLParser } from 'fast-xml-parser';
import { logger } from '../../utils/logger.js';
import type { LineCandidate } from './matchers.js';

const TERMINOLOGY_BLOCK = /<terminology>[\s\S]*<\/terminology>/i;

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: name => name.toLowerCase() === 'term',
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(entry: Record<string, unknown>, name: string): string {
  const key = Object.keys(entry).find(k => k.toLowerCase() === name.toLowerCase());
  const value = key ? entry[key] : undefined;
  return typeof value === 'string' || typeof value === 'number' ? String(value).trim() : '';
}

export function hasTerminologyXml(text: string): boolean {
  return TERMINOLOGY_BLOCK.test(text);
}

/**
 * Reads `<terminology><term><ZH_CN/><EN_US/></term>...</terminology>` replies.
 * Returns null when the block is present but cannot be parsed.
 */
export function parseTerminologyXml(text: string): LineCandidate[] | null {
  const block = TERMINOLOGY_BLOCK.exec(text);
  if (!block) return null;

  let doc: unknown;
  try {
    doc = parser.parse(block[0]);
  } catch (error) {
    logger.warn({ error }, 'Malformed terminology XML, falling back to line parsing');
    return null;
  }

  if (!isRecord(doc)) return null;
  const rootKey = Object.keys(doc).find(k => k.toLowerCase() === 'terminology');
  const root = rootKey ? doc[rootKey] : undefined;
  if (!isRecord(root)) return [];

  const termKey = Object.keys(root).find(k => k.toLowerCase() === 'term');
  const terms = termKey ? root[termKey] : undefined;
  if (!Array.isArray(terms)) return [];

  return terms.filter(isRecord).map((entry, i) => ({
    ordinal: i + 1,
    source: field(entry, 'ZH_CN'),
    target: field(entry, 'EN_US'),
  }));
}
