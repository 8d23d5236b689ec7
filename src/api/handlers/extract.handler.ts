import { basename } from 'path';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import {
  EmptyExtractionResult,
  InvalidTemplateError,
  ModelInvocationError,
  UnreadablePdfError,
  ValidationError,
  isPipelineError,
} from '../../utils/errors.js';
import { idModeSchema } from '../../config/validation.js';
import { LogStreamReporter } from '../../services/pipeline/reporters/LogStreamReporter.js';
import type { TermExtractionPipeline } from '../../services/pipeline/TermExtractionPipeline.js';
import type { IdMode } from '../../types/terms.types.js';

interface UploadedPdf {
  filename: string;
  buffer: Buffer;
}

interface ExtractForm {
  zh?: UploadedPdf;
  en?: UploadedPdf;
  model?: string;
  template?: string;
  idMode?: IdMode;
}

const FILE_FIELDS = new Set(['zh', 'en']);

interface ClosableResponse {
  readonly writableFinished: boolean;
  once(event: 'close', listener: () => void): unknown;
}

/** Aborts when the connection closes before the reply was sent. */
export function abortOnDisconnect(response: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableFinished) {
      logger.warn('Client disconnected, cancelling extraction');
      controller.abort();
    }
  });
  return controller.signal;
}

export function statusForError(error: unknown): number {
  if (error instanceof ValidationError) return 400;
  if (error instanceof InvalidTemplateError || error instanceof UnreadablePdfError) return 400;
  if (error instanceof EmptyExtractionResult) return 422;
  if (error instanceof ModelInvocationError) return 502;
  return 500;
}

async function readForm(request: FastifyRequest): Promise<ExtractForm> {
  const form: ExtractForm = {};

  for await (const part of request.parts()) {
    if (part.type === 'file') {
      const buffer = await part.toBuffer();
      if (part.fieldname === 'zh' || part.fieldname === 'en') {
        form[part.fieldname] = { filename: part.filename, buffer };
      } else {
        logger.warn({ field: part.fieldname }, 'Ignoring unexpected upload field');
      }
      continue;
    }

    if (FILE_FIELDS.has(part.fieldname)) {
      throw new ValidationError(`Field ${part.fieldname} must be a PDF file upload`);
    }
    const value = typeof part.value === 'string' ? part.value.trim() : '';
    if (!value) continue;

    switch (part.fieldname) {
      case 'model':
        form.model = value;
        break;
      case 'template':
        form.template = value;
        break;
      case 'idMode': {
        const parsed = idModeSchema.safeParse(value);
        if (!parsed.success) {
          throw new ValidationError('idMode must be sequential or random_token', parsed.error.issues);
        }
        form.idMode = parsed.data;
        break;
      }
    }
  }

  return form;
}

export function createExtractHandler(pipeline: Pick<TermExtractionPipeline, 'run'>) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const logStream = new LogStreamReporter();
    const signal = abortOnDisconnect(reply.raw);

    try {
      const form = await readForm(request);

      if (!form.zh || !form.en) {
        const missing = [form.zh ? null : 'zh', form.en ? null : 'en'].filter(Boolean).join(' and ');
        return reply.code(400).send({
          error: 'VALIDATION_ERROR',
          stage: 'acquisition',
          message: `Missing PDF upload: ${missing}`,
          log: logStream.getLines(),
        });
      }

      logger.info(
        { zh: form.zh.filename, en: form.en.filename, zhBytes: form.zh.buffer.length, enBytes: form.en.buffer.length },
        'Received PDF pair'
      );

      const result = await pipeline.run({
        zhSource: form.zh.buffer,
        enSource: form.en.buffer,
        zhLabel: form.zh.filename,
        enLabel: form.en.filename,
        modelId: form.model,
        template: form.template,
        idMode: form.idMode,
        signal,
        reporter: logStream,
      });

      return reply.code(200).send({
        outputFile: basename(result.outputPath),
        termCount: result.termCount,
        chunkCount: result.chunkCount,
        modelId: result.modelId,
        rows: result.rows,
        log: logStream.getLines(),
      });
    } catch (error) {
      logger.error({ error }, 'Extract handler error');

      if (error instanceof ValidationError) {
        return reply.code(400).send({
          error: error.code,
          message: error.message,
          log: logStream.getLines(),
        });
      }

      if (isPipelineError(error)) {
        return reply.code(statusForError(error)).send({
          error: error.code,
          stage: error.stage,
          message: error.message,
          log: logStream.getLines(),
        });
      }

      throw error;
    }
  };
}
