import { ModelGateway } from '../../src/services/llm/ModelGateway.js';
import { ModelInvocationError } from '../../src/utils/errors.js';
import type { ExtractionRequest } from '../../src/types/terms.types.js';
import type { CompletionResponse } from '../../src/services/llm/ModelTransport.interface.js';
import {
  FakeApiError,
  chatText,
  completionText,
  fakeChat,
  fakeCompletion,
  transportsOf,
} from '../helpers/transports.js';

function request(modelId: string, prompt = 'extract'): ExtractionRequest {
  return {
    zhText: '服务器',
    enText: 'server',
    modelId,
    template: '{chinese_text}{english_text}',
    prompt,
    params: { maxTokens: 100, temperature: 0 },
  };
}

describe('ModelGateway', () => {
  it('sends chat models through the chat transport', async () => {
    const chat = fakeChat(() => chatText('1|服务器|Server'));
    const completion = fakeCompletion(() => completionText('unused'));
    const gateway = new ModelGateway(transportsOf(chat, completion));

    const response = await gateway.invoke(request('claude-3-5-sonnet-latest', 'the prompt'));

    expect(response).toMatchObject({ text: '1|服务器|Server', modelId: 'claude-3-5-sonnet-latest', family: 'chat' });
    expect(response.durationMs).toBeGreaterThanOrEqual(0);
    expect(chat.sent).toEqual([
      {
        model: 'claude-3-5-sonnet-latest',
        max_tokens: 100,
        temperature: 0,
        messages: [{ role: 'user', content: [{ type: 'text', text: 'the prompt' }] }],
      },
    ]);
    expect(completion.sent).toHaveLength(0);
  });

  it('sends unknown models through the completion transport', async () => {
    const chat = fakeChat(() => chatText('unused'));
    const completion = fakeCompletion(() => completionText('1,服务器,Server'));
    const gateway = new ModelGateway(transportsOf(chat, completion));

    const response = await gateway.invoke(request('local-model', 'the prompt'));

    expect(response.family).toBe('completion');
    expect(completion.sent).toEqual([{ model: 'local-model', prompt: 'the prompt', max_tokens: 100, temperature: 0 }]);
    expect(chat.sent).toHaveLength(0);
  });

  it('wraps transport failures with the HTTP status', async () => {
    const failure = new FakeApiError('rate limited', 429);
    const chat = fakeChat(() => {
      throw failure;
    });
    const gateway = new ModelGateway(transportsOf(chat, fakeCompletion(() => completionText(''))));

    const error = await gateway.invoke(request('claude-3-5-haiku-latest')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelInvocationError);
    expect(error).toMatchObject({
      message: 'Model call to claude-3-5-haiku-latest failed',
      modelId: 'claude-3-5-haiku-latest',
      status: 429,
      aborted: false,
      details: failure,
    });
  });

  it('does not call the transport when the signal is already aborted', async () => {
    const chat = fakeChat(() => chatText('1|服务器|Server'));
    const gateway = new ModelGateway(transportsOf(chat, fakeCompletion(() => completionText(''))));
    const controller = new AbortController();
    controller.abort();

    const error = await gateway
      .invoke(request('claude-3-5-sonnet-latest'), { signal: controller.signal })
      .catch((e: unknown) => e);

    expect(error).toMatchObject({ aborted: true, code: 'MODEL_INVOCATION_ERROR' });
    expect(chat.sent).toHaveLength(0);
  });

  it('reports a call cancelled in flight as aborted', async () => {
    const controller = new AbortController();
    const completion = fakeCompletion(
      (_envelope, options) =>
        new Promise<CompletionResponse>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => {
            const abort = new Error('Request was aborted.');
            abort.name = 'AbortError';
            reject(abort);
          });
        })
    );
    const gateway = new ModelGateway(transportsOf(fakeChat(() => chatText('')), completion));

    const pending = gateway.invoke(request('davinci-002'), { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toMatchObject({ message: 'Model call cancelled', aborted: true });
  });

  it('treats a blank reply as a failed call', async () => {
    const chat = fakeChat(() => chatText('   \n'));
    const gateway = new ModelGateway(transportsOf(chat, fakeCompletion(() => completionText(''))));

    await expect(gateway.invoke(request('claude-3-5-sonnet-latest'))).rejects.toThrow(
      'Empty response from claude-3-5-sonnet-latest'
    );
  });

  it('passes through credential errors raised while picking the transport', async () => {
    const gateway = new ModelGateway({
      chatTransport: () => {
        throw new ModelInvocationError('ANTHROPIC_API_KEY is not set', { modelId: 'claude-3-5-sonnet-latest' });
      },
      completionTransport: () => fakeCompletion(() => completionText('')),
    });

    await expect(gateway.invoke(request('claude-3-5-sonnet-latest'))).rejects.toThrow('ANTHROPIC_API_KEY is not set');
  });

  it('reports credential errors against the requested model', async () => {
    const gateway = new ModelGateway({
      chatTransport: () => fakeChat(() => chatText('')),
      completionTransport: () => {
        throw new ModelInvocationError('OPENAI_API_KEY is not set', { modelId: 'claude-3-5-sonnet-latest' });
      },
    });

    const error = await gateway.invoke(request('davinci-002')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ModelInvocationError);
    expect(error).toMatchObject({ message: 'OPENAI_API_KEY is not set', modelId: 'davinci-002', aborted: false });
  });
});
