import dotenv from 'dotenv';
import { z } from 'zod';

const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1';
const DEFAULT_MODEL = 'mistralai/mistral-small-3.2-24b-instruct:free';

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  OPENAI_API_KEY: optionalText,
  LLM_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  LLM_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  CORS_ORIGIN: z.string().min(1).default('*'),
});

export type LlmConfig = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
  maxAttempts: number;
};

export type AppConfig = {
  port: number;
  corsOrigin: string;
  llm: LlmConfig;
};

// Blank values count as unset.
const withoutBlanks = (env: Record<string, string | undefined>): Record<string, string> => {
  const cleaned: Record<string, string> = {};

  Object.entries(env).forEach(([key, value]) => {
    if (typeof value === 'string' && value.trim() !== '') {
      cleaned[key] = value;
    }
  });

  return cleaned;
};

export const parseConfig = (env: Record<string, string | undefined>): AppConfig => {
  const result = envSchema.safeParse(withoutBlanks(env));

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;

  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    llm: {
      apiKey: parsed.OPENAI_API_KEY,
      baseUrl: parsed.LLM_BASE_URL,
      model: parsed.LLM_MODEL,
      maxTokens: parsed.LLM_MAX_TOKENS,
      temperature: parsed.LLM_TEMPERATURE,
      maxAttempts: parsed.LLM_MAX_ATTEMPTS,
    },
  };
};

export const loadConfig = (): AppConfig => {
  dotenv.config();
  return parseConfig(process.env);
};
