export interface TextBlockParam {
  type: 'text';
  text: string;
}

/** Messages-style request: a structured message list with content blocks. */
export interface ChatEnvelope {
  model: string;
  max_tokens: number;
  temperature: number;
  messages: Array<{ role: 'user'; content: TextBlockParam[] }>;
}

export interface ChatResponse {
  content: Array<{ type: string; text?: string }>;
}

/** Completion-style request: one prompt string. */
export interface CompletionEnvelope {
  model: string;
  prompt: string;
  max_tokens: number;
  temperature: number;
}

export interface CompletionResponse {
  choices: Array<{ text: string }>;
}

export interface SendOptions {
  signal?: AbortSignal;
}

export interface ModelTransport<Envelope, Response> {
  readonly name: string;
  send(envelope: Envelope, options?: SendOptions): Promise<Response>;
  testConnection(): Promise<boolean>;
}

export type ChatTransport = ModelTransport<ChatEnvelope, ChatResponse>;
export type CompletionTransport = ModelTransport<CompletionEnvelope, CompletionResponse>;

export interface TransportProvider {
  chatTransport(): ChatTransport;
  completionTransport(): CompletionTransport;
}
