import 'dotenv/config';
import * as joi from 'joi';

interface EnvVars {
  NATS_SERVERS: string[];
  OPENAI_API_KEY: string;
  OPENAI_MODEL: string;
  OPENAI_REQUEST_TIMEOUT_MS: number;
  OPENAI_MAX_RETRIES: number;
  OPENAI_MAX_OUTPUT_TOKENS: number;
  EXTRACTION_LANGUAGE: string;
}

const envSchema = joi
  .object<EnvVars>({
    NATS_SERVERS: joi.array().items(joi.string()).min(1).required(),
    OPENAI_API_KEY: joi.string().required(),
    OPENAI_MODEL: joi.string().default('gpt-4o-mini'),
    OPENAI_REQUEST_TIMEOUT_MS: joi.number().integer().min(1000).default(60000),
    OPENAI_MAX_RETRIES: joi.number().integer().min(0).default(2),
    OPENAI_MAX_OUTPUT_TOKENS: joi.number().integer().min(256).default(2000),
    EXTRACTION_LANGUAGE: joi.string().default('English'),
  })
  .unknown(true);

const { error, value } = envSchema.validate({
  ...process.env,
  NATS_SERVERS: process.env['NATS_SERVERS']?.split(',').map((item) => item.trim()),
});

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

const envVars = value as EnvVars;

export const envs = {
  natsServers: envVars.NATS_SERVERS,
  openAiApiKey: envVars.OPENAI_API_KEY,
  openAiModel: envVars.OPENAI_MODEL,
  openAiTimeoutMs: envVars.OPENAI_REQUEST_TIMEOUT_MS,
  openAiMaxRetries: envVars.OPENAI_MAX_RETRIES,
  openAiMaxOutputTokens: envVars.OPENAI_MAX_OUTPUT_TOKENS,
  extractionLanguage: envVars.EXTRACTION_LANGUAGE,
};
