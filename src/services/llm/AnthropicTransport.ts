import Anthropic from '@anthropic-ai/sdk';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import type { ChatEnvelope, ChatResponse, ChatTransport, SendOptions } from './ModelTransport.interface.js';

export class AnthropicTransport implements ChatTransport {
  readonly name = 'anthropic';
  private client: Anthropic;

  constructor(apiKey: string = config.llm.anthropicApiKey) {
    this.client = new Anthropic({
      apiKey,
      timeout: config.llm.timeoutMs,
      maxRetries: 0,
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: 'claude-3-5-haiku-latest',
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async send(envelope: ChatEnvelope, options: SendOptions = {}): Promise<ChatResponse> {
    logger.debug({ model: envelope.model, maxTokens: envelope.max_tokens }, 'Sending messages request to Anthropic');

    const message = await this.client.messages.create(envelope, { signal: options.signal });

    logger.debug(
      {
        model: message.model,
        stopReason: message.stop_reason,
        tokensUsed: message.usage.input_tokens + message.usage.output_tokens,
      },
      'Received response from Anthropic'
    );

    return message;
  }
}
