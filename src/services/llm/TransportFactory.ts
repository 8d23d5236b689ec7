import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ModelInvocationError } from '../../utils/errors.js';
import { AnthropicTransport } from './AnthropicTransport.js';
import { OpenAICompletionTransport } from './OpenAICompletionTransport.js';
import type { ChatTransport, CompletionTransport, TransportProvider } from './ModelTransport.interface.js';

/** Builds the SDK-backed transports on first use, so a missing key only fails the family that needs it. */
export class TransportFactory {
  private static chat: ChatTransport | null = null;
  private static completion: CompletionTransport | null = null;

  static chatTransport(): ChatTransport {
    if (this.chat) {
      return this.chat;
    }
    if (!config.llm.anthropicApiKey) {
      throw new ModelInvocationError('ANTHROPIC_API_KEY is not set', { modelId: config.llm.model });
    }
    logger.info('Initializing Anthropic transport');
    this.chat = new AnthropicTransport();
    return this.chat;
  }

  static completionTransport(): CompletionTransport {
    if (this.completion) {
      return this.completion;
    }
    if (!config.llm.openaiApiKey) {
      throw new ModelInvocationError('OPENAI_API_KEY is not set', { modelId: config.llm.model });
    }
    logger.info({ baseUrl: config.llm.openaiBaseUrl }, 'Initializing OpenAI completions transport');
    this.completion = new OpenAICompletionTransport();
    return this.completion;
  }
}

export const defaultTransports: TransportProvider = {
  chatTransport: () => TransportFactory.chatTransport(),
  completionTransport: () => TransportFactory.completionTransport(),
};
