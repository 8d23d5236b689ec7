import type { ModelFamily } from '../../types/terms.types.js';
import { resolveFamily } from './families.js';

export interface KnownModel {
  id: string;
  label: string;
  family: ModelFamily;
}

const MODELS: Array<Omit<KnownModel, 'family'>> = [
  { id: 'claude-3-5-sonnet-latest', label: 'Claude 3.5 Sonnet' },
  { id: 'claude-3-5-haiku-latest', label: 'Claude 3.5 Haiku' },
  { id: 'claude-3-7-sonnet-latest', label: 'Claude 3.7 Sonnet' },
  { id: 'gpt-3.5-turbo-instruct', label: 'GPT-3.5 Turbo Instruct' },
  { id: 'davinci-002', label: 'Davinci 002' },
  { id: 'babbage-002', label: 'Babbage 002' },
];

export const KNOWN_MODELS: readonly KnownModel[] = MODELS.map(model => ({
  ...model,
  family: resolveFamily(model.id),
}));

export function isKnownModel(modelId: string): boolean {
  return KNOWN_MODELS.some(model => model.id === modelId);
}
