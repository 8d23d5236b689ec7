import { readFile } from 'fs/promises';
import { logger } from '../../utils/logger.js';
import { InvalidTemplateError } from '../../utils/errors.js';
import {
  CHINESE_TEXT_MARKER,
  ENGLISH_TEXT_MARKER,
  TERM_EXTRACTION_TEMPLATE,
} from '../llm/prompts/term-extraction.js';
import type { ExtractionRequest, GenerationParams } from '../../types/terms.types.js';

const MARKER_PATTERN = /\{(chinese_text|english_text)\}/g;

export function validateTemplate(template: string): void {
  const missing = [CHINESE_TEXT_MARKER, ENGLISH_TEXT_MARKER].filter(marker => !template.includes(marker));
  if (missing.length > 0) {
    throw new InvalidTemplateError(`Template is missing placeholder ${missing.join(' and ')}`, missing);
  }
}

/** The template with both markers removed: what every prompt costs besides the texts. */
export function templateBoilerplate(template: string): string {
  return template.replace(MARKER_PATTERN, '');
}

export function renderTemplate(template: string, zhText: string, enText: string): string {
  // Single pass: inserted document text is never rescanned for markers.
  return template.replace(MARKER_PATTERN, (_match, key: string) => (key === 'chinese_text' ? zhText : enText));
}

export function buildRequest(
  zhText: string,
  enText: string,
  template: string,
  params: GenerationParams,
  modelId: string
): ExtractionRequest {
  validateTemplate(template);

  const prompt = renderTemplate(template, zhText, enText);

  logger.debug(
    { modelId, promptLength: prompt.length, zhLength: zhText.length, enLength: enText.length },
    'Built extraction request'
  );

  return Object.freeze({
    zhText,
    enText,
    modelId,
    template,
    prompt,
    params: Object.freeze({ ...params }),
  });
}

/** Resolves the template to use: explicit text, then a template file, then the built-in default. */
export async function resolveTemplate(options: { template?: string; templateFile?: string }): Promise<string> {
  if (options.template && options.template.trim().length > 0) {
    return options.template;
  }

  if (options.templateFile) {
    try {
      const template = await readFile(options.templateFile, 'utf-8');
      logger.info({ templateFile: options.templateFile }, 'Loaded prompt template from file');
      return template;
    } catch (error) {
      throw new InvalidTemplateError(`Cannot read template file ${options.templateFile}`, [], error);
    }
  }

  return TERM_EXTRACTION_TEMPLATE;
}
