import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const int = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const float = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

const str = (value: string | undefined): string | undefined => (value ? value : undefined);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    server: {
      nodeEnv: str(env.NODE_ENV),
      port: int(env.PORT),
      logLevel: str(env.LOG_LEVEL),
    },
    llm: {
      model: str(env.LLM_MODEL),
      anthropicApiKey: env.ANTHROPIC_API_KEY || '',
      openaiApiKey: env.OPENAI_API_KEY || '',
      openaiBaseUrl: str(env.OPENAI_BASE_URL),
      maxTokens: int(env.LLM_MAX_TOKENS),
      temperature: float(env.LLM_TEMPERATURE),
      timeoutMs: int(env.LLM_TIMEOUT_MS),
      contextTokens: int(env.LLM_CONTEXT_TOKENS),
    },
    extraction: {
      maxChars: int(env.EXTRACTION_MAX_CHARS),
      templateFile: str(env.EXTRACTION_TEMPLATE_FILE),
      idMode: str(env.ID_MODE),
      tokenLength: int(env.ID_TOKEN_LENGTH),
    },
    output: {
      dir: str(env.OUTPUT_DIR),
      format: str(env.OUTPUT_FORMAT),
    },
    storage: {
      maxUploadSizeMB: float(env.MAX_UPLOAD_SIZE_MB),
    },
  };

  return configSchema.parse(rawConfig);
}

function loadConfigOrExit(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfigOrExit();
