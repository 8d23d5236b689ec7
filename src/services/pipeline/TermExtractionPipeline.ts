import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { generateRunId } from '../../utils/uuid.js';
import {
  EmptyExtractionResult,
  ModelInvocationError,
  UnreadablePdfError,
  type PipelineStage,
} from '../../utils/errors.js';
import { PdfTextExtractor, type PdfSource, type TextSource } from '../extraction/PdfTextExtractor.js';
import { ContextChunker, type ContextWindow } from '../chunking/ContextChunker.js';
import { buildRequest, resolveTemplate, templateBoilerplate, validateTemplate } from '../prompt/PromptBuilder.js';
import { ModelGateway } from '../llm/ModelGateway.js';
import { isKnownModel } from '../llm/models.js';
import { parseTerms } from '../parsing/ResponseParser.js';
import { assignIds, register } from '../registry/TermRegistry.js';
import { buildOutputPath, writeTable } from '../registry/TableWriter.js';
import { LoggerReporter } from './reporters/LoggerReporter.js';
import { CompositeReporter } from './reporters/CompositeReporter.js';
import type { PipelineReporter } from './events.js';
import type { OutputFormat } from '../../config/validation.js';
import type {
  ExtractedText,
  GenerationParams,
  IdMode,
  OutputRow,
  TermRecord,
} from '../../types/terms.types.js';

export interface PipelineOptions {
  defaultModel: string;
  params: GenerationParams;
  idMode: IdMode;
  tokenLength: number;
  outputDir: string;
  outputFormat: OutputFormat;
  templateFile?: string;
}

export interface PipelineDependencies {
  textSource: TextSource;
  gateway: Pick<ModelGateway, 'invoke'>;
  chunker?: Pick<ContextChunker, 'planWindows' | 'countTokens'>;
}

export interface RunInput {
  zhSource: PdfSource;
  enSource: PdfSource;
  zhLabel?: string;
  enLabel?: string;
  modelId?: string;
  template?: string;
  idMode?: IdMode;
  outputPath?: string;
  signal?: AbortSignal;
  reporter?: PipelineReporter;
}

export interface PipelineResult {
  runId: string;
  outputPath: string;
  rows: OutputRow[];
  termCount: number;
  chunkCount: number;
  modelId: string;
  durationMs: number;
}

/**
 * Acquisition → prompt → model → parse → registry → file, strictly in that
 * order. The file is written only once every window parsed, so a failed or
 * cancelled run leaves nothing on disk.
 */
export class TermExtractionPipeline {
  constructor(
    private deps: PipelineDependencies,
    private options: PipelineOptions
  ) {}

  static fromConfig(overrides: Partial<PipelineOptions> = {}): TermExtractionPipeline {
    return new TermExtractionPipeline(
      {
        textSource: new PdfTextExtractor(config.extraction.maxChars),
        gateway: new ModelGateway(),
        chunker: config.llm.contextTokens > 0 ? new ContextChunker(config.llm.contextTokens) : undefined,
      },
      {
        defaultModel: config.llm.model,
        params: { maxTokens: config.llm.maxTokens, temperature: config.llm.temperature },
        idMode: config.extraction.idMode,
        tokenLength: config.extraction.tokenLength,
        outputDir: config.output.dir,
        outputFormat: config.output.format,
        templateFile: config.extraction.templateFile,
        ...overrides,
      }
    );
  }

  async run(input: RunInput): Promise<PipelineResult> {
    const startTime = Date.now();
    const runId = generateRunId();
    const log = logger.child({ runId });
    const reporter = new CompositeReporter(new LoggerReporter(log), ...(input.reporter ? [input.reporter] : []));
    const modelId = input.modelId?.trim() || this.options.defaultModel;

    log.info({ modelId }, 'Starting term extraction run');
    if (!isKnownModel(modelId)) {
      log.warn({ modelId }, 'Model id is not in the known list, routing by prefix');
    }

    const template = await this.stage(reporter, 'prompt', 'Checking prompt template', async () => {
      const resolved = await resolveTemplate({ template: input.template, templateFile: this.options.templateFile });
      validateTemplate(resolved);
      return resolved;
    }, () => 'Prompt template ready');

    const zh = await this.acquire(reporter, input.zhSource, input.zhLabel ?? 'Chinese PDF');
    const en = await this.acquire(reporter, input.enSource, input.enLabel ?? 'English PDF');

    const windows = await this.stage(reporter, 'prompt', 'Planning context windows', async () =>
      this.planWindows(zh.text, en.text, template),
    planned => `${planned.length} context window${planned.length === 1 ? '' : 's'}`);
    const records: TermRecord[] = [];

    for (const window of windows) {
      this.throwIfAborted(reporter, input.signal, modelId);
      const suffix = windows.length > 1 ? ` (window ${window.index + 1}/${windows.length})` : '';

      const request = await this.stage(reporter, 'prompt', `Building request${suffix}`, async () =>
        buildRequest(window.zhText, window.enText, template, this.options.params, modelId),
      req => `Request built: ${req.prompt.length} characters${suffix}`);

      const response = await this.stage(reporter, 'invocation', `Invoking ${modelId}${suffix}`, () =>
        this.deps.gateway.invoke(request, { signal: input.signal }),
      res => `Model answered in ${(res.durationMs / 1000).toFixed(1)}s${suffix}`);

      try {
        const terms = await this.stage(reporter, 'parsing', `Parsing response${suffix}`, async () =>
          parseTerms(response.text),
        parsed => `Parsed ${parsed.length} terms${suffix}`);
        records.push(...terms);
      } catch (error) {
        if (error instanceof EmptyExtractionResult && windows.length > 1) {
          log.warn({ window: window.index }, 'No terms in window, continuing');
          continue;
        }
        throw error;
      }
    }

    const rows = await this.stage(reporter, 'registry', 'Deduplicating terms', async () => {
      const termSet = register(records);
      if (termSet.length === 0) {
        throw new EmptyExtractionResult('No term pairs found in any window');
      }
      return assignIds(termSet, input.idMode ?? this.options.idMode, this.options.tokenLength);
    }, result => `${result.length} unique terms`);

    this.throwIfAborted(reporter, input.signal, modelId);

    const outputPath = input.outputPath ?? buildOutputPath(this.options.outputDir, this.options.outputFormat);
    await this.stage(reporter, 'output', `Writing ${outputPath}`, () => writeTable(rows, outputPath),
      () => `Wrote ${rows.length} terms to ${outputPath}`);

    const durationMs = Date.now() - startTime;
    log.info({ outputPath, termCount: rows.length, windows: windows.length, durationMs }, 'Term extraction run complete');

    return {
      runId,
      outputPath,
      rows,
      termCount: rows.length,
      chunkCount: windows.length,
      modelId,
      durationMs,
    };
  }

  private async acquire(reporter: PipelineReporter, source: PdfSource, label: string): Promise<ExtractedText> {
    return this.stage(reporter, 'acquisition', `Extracting text from ${label}`, async () => {
      const extracted = await this.deps.textSource.extractText(source, label);
      if (!extracted.text.trim()) {
        throw new UnreadablePdfError(`${label} contains no extractable text`, label);
      }
      return extracted;
    }, extracted =>
      `Extracted ${extracted.text.length} characters from ${label}${extracted.truncated ? ' (truncated)' : ''}`);
  }

  private planWindows(zhText: string, enText: string, template: string): ContextWindow[] {
    const chunker = this.deps.chunker;
    if (!chunker) {
      return [{ index: 0, zhText, enText, tokens: 0 }];
    }
    const overhead = chunker.countTokens(templateBoilerplate(template)) + this.options.params.maxTokens;
    return chunker.planWindows(zhText, enText, overhead);
  }

  private throwIfAborted(reporter: PipelineReporter, signal: AbortSignal | undefined, modelId: string): void {
    if (!signal?.aborted) return;
    const error = new ModelInvocationError('Run cancelled', { modelId, aborted: true });
    reporter.emit({ type: 'error', stage: 'invocation', message: error.message, error, at: new Date() });
    throw error;
  }

  private async stage<T>(
    reporter: PipelineReporter,
    stage: PipelineStage,
    startMessage: string,
    fn: () => Promise<T>,
    endMessage: (result: T) => string
  ): Promise<T> {
    reporter.emit({ type: 'stage-start', stage, message: startMessage, at: new Date() });
    try {
      const result = await fn();
      reporter.emit({ type: 'stage-end', stage, message: endMessage(result), at: new Date() });
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      reporter.emit({ type: 'error', stage, message, error, at: new Date() });
      throw error;
    }
  }
}

