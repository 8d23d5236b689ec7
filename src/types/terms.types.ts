import type { IdMode } from '../config/validation.js';

export type ModelFamily = 'chat' | 'completion';

export interface ExtractedText {
  text: string;
  pageCount: number;
  originalLength: number;
  truncated: boolean;
}

export interface GenerationParams {
  maxTokens: number;
  temperature: number;
}

export interface ExtractionRequest {
  readonly zhText: string;
  readonly enText: string;
  readonly modelId: string;
  readonly template: string;
  readonly prompt: string;
  readonly params: Readonly<GenerationParams>;
}

export interface RawModelResponse {
  text: string;
  modelId: string;
  family: ModelFamily;
  durationMs: number;
}

export interface TermRecord {
  sequenceIndex: number;
  sourceTerm: string;
  targetTerm: string;
}

export type TermSet = readonly TermRecord[];

export interface OutputRow {
  id: string;
  zh: string;
  en: string;
}

export type { IdMode };
