import { z } from "zod";

export const OPENAI_DEFAULT_MODEL = "gpt-5-nano";
export const OPENROUTER_DEFAULT_MODEL = "nvidia/nemotron-3-nano-30b-a3b:free";
export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

const EnvSchema = z.object({
  USE_OPENROUTER: z
    .string()
    .optional()
    .transform((value) => value === "true"),
  OPENAI_SECRET_KEY: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  ANALYZER_MODEL: z.string().optional(),
  ANALYZER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  ANALYZER_MAX_TOKENS: z.coerce.number().int().positive().default(15_000),
});

export interface AnalyzerConfig {
  useOpenRouter: boolean;
  apiKey: string | undefined;
  baseURL: string | undefined;
  model: string;
  timeoutMs: number;
  maxTokens: number;
}

/**
 * Read analyzer settings from the environment.
 * Throws a readable error when a numeric setting is malformed.
 */
export function loadAnalyzerConfig(
  env: Record<string, string | undefined> = process.env
): AnalyzerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  const useOpenRouter = values.USE_OPENROUTER;

  return {
    useOpenRouter,
    apiKey:
      (useOpenRouter ? values.OPENROUTER_API_KEY : values.OPENAI_SECRET_KEY) ||
      undefined,
    baseURL: useOpenRouter ? OPENROUTER_BASE_URL : undefined,
    model:
      values.ANALYZER_MODEL ||
      (useOpenRouter ? OPENROUTER_DEFAULT_MODEL : OPENAI_DEFAULT_MODEL),
    timeoutMs: values.ANALYZER_TIMEOUT_MS,
    maxTokens: values.ANALYZER_MAX_TOKENS,
  };
}
