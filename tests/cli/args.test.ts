import { EXIT_FAILURE, EXIT_NO_TERMS, exitCodeFor, parseArgs } from '../../src/cli/args.js';
import { EmptyExtractionResult, ModelInvocationError, ValidationError } from '../../src/utils/errors.js';

describe('parseArgs', () => {
  it('reads every option', () => {
    expect(
      parseArgs([
        '--zh', 'manual_zh.pdf',
        '--en', 'manual_en.pdf',
        '--model', 'davinci-002',
        '--template', 'prompt.txt',
        '--output', 'out.xlsx',
        '--id-mode', 'sequential',
        '--format', 'xlsx',
      ])
    ).toEqual({
      zh: 'manual_zh.pdf',
      en: 'manual_en.pdf',
      model: 'davinci-002',
      template: 'prompt.txt',
      output: 'out.xlsx',
      idMode: 'sequential',
      format: 'xlsx',
    });
  });

  it('reads the flags', () => {
    expect(parseArgs(['--list-models'])).toEqual({ listModels: true });
    expect(parseArgs(['-h'])).toEqual({ help: true });
  });

  it('rejects an option without a value', () => {
    expect(() => parseArgs(['--zh', '--en', 'en.pdf'])).toThrow('--zh requires a value');
  });

  it('rejects invalid choices', () => {
    expect(() => parseArgs(['--id-mode', 'uuid'])).toThrow(ValidationError);
    expect(() => parseArgs(['--format', 'json'])).toThrow('--format must be csv or xlsx');
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });
});

describe('exitCodeFor', () => {
  it('uses a dedicated code when no terms were found', () => {
    expect(exitCodeFor(new EmptyExtractionResult('none'))).toBe(EXIT_NO_TERMS);
    expect(exitCodeFor(new ModelInvocationError('failed', { modelId: 'davinci-002' }))).toBe(EXIT_FAILURE);
  });
});
