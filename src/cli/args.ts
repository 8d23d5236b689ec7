import { config } from '../config/index.js';
import { idModeSchema, outputFormatSchema, type IdMode, type OutputFormat } from '../config/validation.js';
import { EmptyExtractionResult, ValidationError } from '../utils/errors.js';

export interface CliArgs {
  zh?: string;
  en?: string;
  model?: string;
  template?: string;
  output?: string;
  idMode?: IdMode;
  format?: OutputFormat;
  listModels?: boolean;
  help?: boolean;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_NO_TERMS = 2;

export const HELP = `
Bilingual Term Extractor - Build a Chinese/English glossary from a pair of parallel PDFs

Usage:
  term-extractor --zh <pdf> --en <pdf> [options]

Options:
  --zh <path>          Chinese PDF (required)
  --en <path>          English PDF (required)
  --model <id>         Model identifier (default: ${config.llm.model})
  --template <file>    Prompt template file containing {chinese_text} and {english_text}
  --output <path>      Output file; .xlsx writes a workbook, anything else CSV
  --id-mode <mode>     sequential or random_token (default: ${config.extraction.idMode})
  --format <fmt>       csv or xlsx when --output is not given (default: ${config.output.format})
  --list-models        Print the known models and exit
  --help               Show this help message

Examples:
  term-extractor --zh ./manual_zh.pdf --en ./manual_en.pdf
  term-extractor --zh ./zh.pdf --en ./en.pdf --model gpt-3.5-turbo-instruct --id-mode sequential
  term-extractor --zh ./zh.pdf --en ./en.pdf --output ./glossary.xlsx
`;

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`${flag} requires a value`);
  }
  return value;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--zh':
        args.zh = requireValue(argv, ++i, arg);
        break;
      case '--en':
        args.en = requireValue(argv, ++i, arg);
        break;
      case '--model':
        args.model = requireValue(argv, ++i, arg);
        break;
      case '--template':
        args.template = requireValue(argv, ++i, arg);
        break;
      case '--output':
      case '-o':
        args.output = requireValue(argv, ++i, arg);
        break;
      case '--id-mode': {
        const parsed = idModeSchema.safeParse(requireValue(argv, ++i, arg));
        if (!parsed.success) {
          throw new ValidationError('--id-mode must be sequential or random_token');
        }
        args.idMode = parsed.data;
        break;
      }
      case '--format': {
        const parsed = outputFormatSchema.safeParse(requireValue(argv, ++i, arg));
        if (!parsed.success) {
          throw new ValidationError('--format must be csv or xlsx');
        }
        args.format = parsed.data;
        break;
      }
      case '--list-models':
        args.listModels = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new ValidationError(`Unknown option: ${arg}`);
    }
  }

  return args;
}

export function exitCodeFor(error: unknown): number {
  return error instanceof EmptyExtractionResult ? EXIT_NO_TERMS : EXIT_FAILURE;
}
