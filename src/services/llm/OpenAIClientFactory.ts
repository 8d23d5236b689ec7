import OpenAI from 'openai';
import { config } from '../../config/index.js';

export class OpenAIClientFactory {
  private static instance: OpenAI | null = null;

  static getClient(): OpenAI {
    if (this.instance) {
      return this.instance;
    }

    const clientConfig: { apiKey: string; baseURL?: string; timeout?: number; maxRetries?: number } = {
      apiKey: config.llm.openaiApiKey,
      timeout: config.llm.timeoutMs,
      // Retry policy belongs to the caller.
      maxRetries: 0,
    };

    if (config.llm.openaiBaseUrl) {
      clientConfig.baseURL = config.llm.openaiBaseUrl;
    }

    this.instance = new OpenAI(clientConfig);
    return this.instance;
  }
}
