#!/usr/bin/env node
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { EmptyExtractionResult, describeError } from '../utils/errors.js';
import { TermExtractionPipeline } from '../services/pipeline/TermExtractionPipeline.js';
import { ProgressReporter } from '../services/pipeline/reporters/ProgressReporter.js';
import { KNOWN_MODELS } from '../services/llm/models.js';
import { buildOutputPath } from '../services/registry/TableWriter.js';
import { EXIT_FAILURE, EXIT_OK, HELP, exitCodeFor, parseArgs, type CliArgs } from './args.js';

const printModels = (): void => {
  const maxId = Math.max(...KNOWN_MODELS.map(model => model.id.length));
  for (const model of KNOWN_MODELS) {
    console.log(`  ${model.id.padEnd(maxId)}  ${model.family.padEnd(10)}  ${model.label}`);
  }
};

const main = async (): Promise<number> => {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${describeError(error)}`);
    console.log(HELP);
    return EXIT_FAILURE;
  }

  if (args.help) {
    console.log(HELP);
    return EXIT_OK;
  }

  if (args.listModels) {
    printModels();
    return EXIT_OK;
  }

  if (!args.zh || !args.en) {
    console.error('Error: --zh and --en are required');
    console.log(HELP);
    return EXIT_FAILURE;
  }

  const pipeline = TermExtractionPipeline.fromConfig(args.template ? { templateFile: args.template } : {});
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    const result = await pipeline.run({
      zhSource: args.zh,
      enSource: args.en,
      modelId: args.model,
      idMode: args.idMode,
      outputPath: args.output ?? buildOutputPath(config.output.dir, args.format ?? config.output.format),
      signal: controller.signal,
      reporter: new ProgressReporter(process.stdout.isTTY),
    });

    console.log(`\nGlossary written: ${result.outputPath}`);
    console.log(`  Terms:    ${result.termCount}`);
    console.log(`  Model:    ${result.modelId}`);
    console.log(`  Windows:  ${result.chunkCount}`);
    console.log(`  Duration: ${(result.durationMs / 1000).toFixed(1)}s`);
    return EXIT_OK;
  } catch (error) {
    logger.debug({ error }, 'Term extraction failed');
    if (error instanceof EmptyExtractionResult) {
      console.error('No terms found in the model response.');
      if (error.rawPreview) {
        console.error(`Response began with: ${error.rawPreview}`);
      }
    } else {
      console.error(`Error: ${describeError(error)}`);
    }
    return exitCodeFor(error);
  } finally {
    process.off('SIGINT', onSigint);
  }
};

main()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error({ error }, 'Unexpected CLI failure');
    process.exit(EXIT_FAILURE);
  });
