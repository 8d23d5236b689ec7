import { logger } from '../../utils/logger.js';
import { ModelInvocationError } from '../../utils/errors.js';
import { MODEL_FAMILIES, resolveFamily, type ModelFamilyShape } from './families.js';
import { defaultTransports } from './TransportFactory.js';
import type { ModelTransport, SendOptions, TransportProvider } from './ModelTransport.interface.js';
import type { ExtractionRequest, ModelFamily, RawModelResponse } from '../../types/terms.types.js';

type Route = (request: ExtractionRequest, options: SendOptions) => Promise<string>;

function createRoute<Envelope, Response>(
  shape: ModelFamilyShape<Envelope, Response>,
  transport: ModelTransport<Envelope, Response>
): Route {
  return async (request, options) => {
    const envelope = shape.buildEnvelope(request.prompt, request.modelId, request.params);
    const response = await transport.send(envelope, options);
    return shape.extractText(response);
  };
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function isAbort(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}

/**
 * Single entry point to the inference back ends. Each model family has a shape
 * (envelope in, text out) and a transport; the family is picked from the model id.
 * Calls are never cached or retried here.
 */
export class ModelGateway {
  private routes: { [F in ModelFamily]: () => Route };

  constructor(transports: TransportProvider = defaultTransports) {
    this.routes = {
      chat: () => createRoute(MODEL_FAMILIES.chat, transports.chatTransport()),
      completion: () => createRoute(MODEL_FAMILIES.completion, transports.completionTransport()),
    };
  }

  async invoke(request: ExtractionRequest, options: SendOptions = {}): Promise<RawModelResponse> {
    const family = resolveFamily(request.modelId);
    const startTime = Date.now();

    logger.info(
      { modelId: request.modelId, family, promptLength: request.prompt.length },
      'Invoking model'
    );

    let text: string;
    try {
      if (options.signal?.aborted) {
        throw new ModelInvocationError('Model call cancelled before it started', {
          modelId: request.modelId,
          aborted: true,
        });
      }
      text = await this.routes[family]()(request, options);
    } catch (error) {
      if (error instanceof ModelInvocationError) {
        if (error.modelId === request.modelId) throw error;
        throw new ModelInvocationError(error.message, {
          modelId: request.modelId,
          status: error.status,
          aborted: error.aborted,
          details: error.details,
        });
      }
      const aborted = isAbort(error, options.signal);
      const status = statusOf(error);
      logger.error({ error, modelId: request.modelId, family, status, aborted }, 'Model invocation failed');
      throw new ModelInvocationError(aborted ? 'Model call cancelled' : `Model call to ${request.modelId} failed`, {
        modelId: request.modelId,
        status,
        aborted,
        details: error,
      });
    }

    const durationMs = Date.now() - startTime;
    if (!text.trim()) {
      throw new ModelInvocationError(`Empty response from ${request.modelId}`, { modelId: request.modelId });
    }

    logger.info(
      { modelId: request.modelId, family, duration: `${durationMs}ms`, responseLength: text.length },
      'Received model response'
    );

    return { text, modelId: request.modelId, family, durationMs };
  }
}
