import type { GenerationParams, ModelFamily } from '../../types/terms.types.js';
import type {
  ChatEnvelope,
  ChatResponse,
  CompletionEnvelope,
  CompletionResponse,
} from './ModelTransport.interface.js';

export interface ModelFamilyShape<Envelope, Response> {
  family: ModelFamily;
  prefixes: readonly string[];
  buildEnvelope(prompt: string, modelId: string, params: GenerationParams): Envelope;
  extractText(response: Response): string;
}

export const chatShape: ModelFamilyShape<ChatEnvelope, ChatResponse> = {
  family: 'chat',
  prefixes: ['claude-', 'anthropic.', 'us.anthropic.', 'eu.anthropic.'],
  buildEnvelope: (prompt, modelId, params) => ({
    model: modelId,
    max_tokens: params.maxTokens,
    temperature: params.temperature,
    messages: [{ role: 'user', content: [{ type: 'text', text: prompt }] }],
  }),
  extractText: response =>
    response.content.flatMap(block => (block.type === 'text' && block.text ? [block.text] : [])).join(''),
};

export const completionShape: ModelFamilyShape<CompletionEnvelope, CompletionResponse> = {
  family: 'completion',
  prefixes: ['gpt-3.5-turbo-instruct', 'davinci-', 'babbage-'],
  buildEnvelope: (prompt, modelId, params) => ({
    model: modelId,
    prompt,
    max_tokens: params.maxTokens,
    temperature: params.temperature,
  }),
  extractText: response => response.choices[0]?.text ?? '',
};

export const MODEL_FAMILIES = {
  chat: chatShape,
  completion: completionShape,
} as const;

export const DEFAULT_FAMILY: ModelFamily = 'completion';

export function resolveFamily(modelId: string): ModelFamily {
  const id = modelId.trim().toLowerCase();
  const match = Object.values(MODEL_FAMILIES).find(shape => shape.prefixes.some(prefix => id.startsWith(prefix)));
  return match ? match.family : DEFAULT_FAMILY;
}
