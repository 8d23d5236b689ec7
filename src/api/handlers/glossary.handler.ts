import { readFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';

export interface GlossaryParams {
  fileName: string;
}

const CONTENT_TYPES: Record<string, string> = {
  '.csv': 'text/csv; charset=utf-8',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/** Serves files from the output directory only; any path component is rejected. */
export function createGlossaryHandler(outputDir: string) {
  return async (request: FastifyRequest<{ Params: GlossaryParams }>, reply: FastifyReply) => {
    const { fileName } = request.params;
    const contentType = CONTENT_TYPES[extname(fileName).toLowerCase()];

    if (basename(fileName) !== fileName || fileName.startsWith('.') || !contentType) {
      return reply.code(400).send({
        error: 'VALIDATION_ERROR',
        message: `Invalid glossary file name: ${fileName}`,
      });
    }

    let data: Buffer;
    try {
      data = await readFile(join(outputDir, fileName));
    } catch (error) {
      if (isMissingFile(error)) {
        return reply.code(404).send({
          error: 'NOT_FOUND',
          message: `Glossary ${fileName} not found`,
        });
      }
      throw error;
    }

    logger.debug({ fileName, bytes: data.length }, 'Serving glossary file');

    return reply
      .code(200)
      .header('Content-Type', contentType)
      .header('Content-Disposition', `attachment; filename="${fileName}"`)
      .send(data);
  };
}
