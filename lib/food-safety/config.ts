import { z } from "zod";

export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
export const DEFAULT_MODEL = "google/gemini-2.5-flash-image-preview:free";
export const DEFAULT_TITLE = "Food Safety Analyzer";

export const ANALYSIS_PROMPT =
  "Analyze this food image for safety concerns. Check for:\n" +
  "- Potentially harmful or unsafe ingredients\n\n" +
  "Provide a concise response about any dangerous ingredients or safety issues found.";

export const REQUEST_TIMEOUT_MS = 60_000;
export const MAX_DIMENSION = 1024;
export const JPEG_QUALITY = 85;
export const MAX_IMAGE_BYTES = 20 * 1024 * 1024; // 20MB

export const SUPPORTED_FORMATS = ["png", "jpg", "jpeg", "webp", "gif"] as const;
export const SUPPORTED_MEDIA_TYPES = ["image/png", "image/jpeg", "image/webp", "image/gif"] as const;

export type AnalyzerConfig = {
  apiKey?: string;
  baseURL: string;
  model: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  referer: string;
  title: string;
};

const blankAsMissing = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  OPENROUTER_API_KEY: blankAsMissing,
  HTTP_REFERER: z.string().default(""),
  X_TITLE: z.string().default(DEFAULT_TITLE),
  FOOD_SAFETY_MODEL: blankAsMissing,
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  const vars = parsed.data;
  return Object.freeze({
    apiKey: vars.OPENROUTER_API_KEY,
    baseURL: OPENROUTER_BASE_URL,
    model: vars.FOOD_SAFETY_MODEL ?? DEFAULT_MODEL,
    prompt: ANALYSIS_PROMPT,
    temperature: 0.1,
    maxTokens: 1000,
    timeoutMs: REQUEST_TIMEOUT_MS,
    referer: vars.HTTP_REFERER,
    title: vars.X_TITLE,
  });
}
