import type OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';
import type {
  CompletionEnvelope,
  CompletionResponse,
  CompletionTransport,
  SendOptions,
} from './ModelTransport.interface.js';

export class OpenAICompletionTransport implements CompletionTransport {
  readonly name = 'openai-completions';
  private client: OpenAI;

  constructor(client: OpenAI = OpenAIClientFactory.getClient()) {
    this.client = client;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async send(envelope: CompletionEnvelope, options: SendOptions = {}): Promise<CompletionResponse> {
    logger.debug({ model: envelope.model, maxTokens: envelope.max_tokens }, 'Sending completion request');

    const completion = await this.client.completions.create(envelope, { signal: options.signal });

    logger.debug(
      {
        model: completion.model,
        finishReason: completion.choices[0]?.finish_reason,
        tokensUsed: completion.usage?.total_tokens,
      },
      'Received completion response'
    );

    return completion;
  }
}
