import OpenAI, { APIError } from "openai";
import sharp from "sharp";
import { attributionHeaders, type Fetch } from "./client";
import type { AnalyzerConfig } from "./config";

export type CheckResult = {
  name: string;
  passed: boolean;
  detail: string;
  warnings: string[];
};

export type SetupCheck = () => Promise<CheckResult>;

export type SetupReport = {
  results: CheckResult[];
  passed: number;
  total: number;
  ok: boolean;
};

export const REQUIRED_PACKAGES = ["next", "react", "openai", "sharp", "dotenv", "zod"] as const;

const CONNECTIVITY_MODEL = "google/gemini-2.0-flash-001";
const CONNECTIVITY_TIMEOUT_MS = 10_000;
const KEY_PREFIX = "sk-or-v1-";

function pass(name: string, detail: string, warnings: string[] = []): CheckResult {
  return { name, passed: true, detail, warnings };
}

function fail(name: string, detail: string, warnings: string[] = []): CheckResult {
  return { name, passed: false, detail, warnings };
}

export async function checkEnvironment(opts: { apiKey?: string; envFileExists: boolean }): Promise<CheckResult> {
  const name = "environment";
  const warnings: string[] = [];

  if (!opts.envFileExists) warnings.push(".env file not found; relying on the process environment.");
  if (!opts.apiKey) return fail(name, "OPENROUTER_API_KEY is not set.", warnings);

  if (!opts.apiKey.startsWith(KEY_PREFIX)) {
    warnings.push(`API key doesn't start with '${KEY_PREFIX}'. Please verify it's correct.`);
  }
  return pass(name, "Environment configuration looks good.", warnings);
}

export async function checkDependencies(
  load: (pkg: string) => Promise<unknown> = (pkg) => import(pkg)
): Promise<CheckResult> {
  const missing: string[] = [];
  for (const pkg of REQUIRED_PACKAGES) {
    try {
      await load(pkg);
    } catch {
      missing.push(pkg);
    }
  }

  if (missing.length) {
    return fail("dependencies", `Missing packages: ${missing.join(", ")}. Please run: npm install`);
  }
  return pass("dependencies", `All ${REQUIRED_PACKAGES.length} packages load.`);
}

export async function checkConnectivity(config: AnalyzerConfig, fetch?: Fetch): Promise<CheckResult> {
  const name = "connectivity";
  if (!config.apiKey) return fail(name, "No API key found.");

  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL,
    timeout: CONNECTIVITY_TIMEOUT_MS,
    maxRetries: 0,
    defaultHeaders: attributionHeaders(config),
    fetch,
  });

  try {
    await openai.chat.completions.create({
      model: CONNECTIVITY_MODEL,
      messages: [{ role: "user", content: "Hello, this is a test message." }],
      max_tokens: 10,
    });
    return pass(name, "API connection successful.");
  } catch (err) {
    if (err instanceof APIError && typeof err.status === "number") {
      return fail(name, `API connection failed: ${err.status} ${err.message}`);
    }
    return fail(name, `API test failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export async function checkImageProcessing(): Promise<CheckResult> {
  const name = "image processing";
  const red = await sharp({
    create: { width: 100, height: 100, channels: 3, background: { r: 255, g: 0, b: 0 } },
  })
    .jpeg()
    .toBuffer();

  const resized = await sharp(red).resize(50, 50, { kernel: sharp.kernel.lanczos3 }).toBuffer();
  const { width, height } = await sharp(resized).metadata();
  if (width !== 50 || height !== 50) {
    return fail(name, `Resize produced ${width}x${height}, expected 50x50.`);
  }
  return pass(name, "Image processing works.");
}

/** Runs every check in order; a check that throws counts as failed. */
export async function runChecks(checks: Array<[string, SetupCheck]>): Promise<SetupReport> {
  const results: CheckResult[] = [];
  for (const [name, check] of checks) {
    try {
      results.push(await check());
    } catch (err) {
      results.push(fail(name, err instanceof Error ? err.message : String(err)));
    }
  }

  const passed = results.filter((r) => r.passed).length;
  return { results, passed, total: results.length, ok: passed === results.length };
}
