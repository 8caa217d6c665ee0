import OpenAI, { APIConnectionError, APIError } from "openai";
import { z } from "zod";
import type { AnalyzerConfig } from "./config";
import { exceedsByteBudget, normalizeImage, toDataUri, type SourceImage } from "./image";
import { defaultPlugins, runPost, runPre, type AnalysisPlugin, type AnalysisRequest } from "./plugins";
import { MISSING_KEY_MESSAGE, type AnalysisResult } from "./result";

export type Fetch = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type ClientOptions = {
  fetch?: Fetch;
  plugins?: AnalysisPlugin[];
};

export interface Analyzer {
  analyze(image: SourceImage): Promise<AnalysisResult>;
}

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .nonempty(),
});

export function attributionHeaders(config: Pick<AnalyzerConfig, "referer" | "title">) {
  const headers: Record<string, string> = {};
  if (config.referer) headers["HTTP-Referer"] = config.referer;
  if (config.title) headers["X-Title"] = config.title;
  return headers;
}

type Rejection = { status: number; body: string };

// The SDK only keeps the parsed error payload; hold on to the raw body text.
function recordRejections(transport: Fetch) {
  const seen: { last?: Rejection } = {};
  const fetch: Fetch = async (input, init) => {
    const response = await transport(input, init);
    if (!response.ok) {
      seen.last = { status: response.status, body: await response.clone().text() };
    }
    return response;
  };
  return { fetch, seen };
}

export class FoodSafetyClient implements Analyzer {
  private readonly transport: Fetch;
  private readonly plugins: AnalysisPlugin[];

  constructor(private readonly config: AnalyzerConfig, options: ClientOptions = {}) {
    this.transport = options.fetch ?? ((input, init) => fetch(input, init));
    this.plugins = options.plugins ?? defaultPlugins;
  }

  /** Runs one image through the pipeline. Never throws. */
  async analyze(image: SourceImage): Promise<AnalysisResult> {
    const { apiKey } = this.config;
    if (!apiKey) {
      return { kind: "configuration-error", message: MISSING_KEY_MESSAGE };
    }

    const { fetch, seen } = recordRejections(this.transport);

    try {
      const jpeg = await normalizeImage(image);
      if (exceedsByteBudget(jpeg)) {
        console.warn(`ANALYZE WARNING: normalized image is ${jpeg.byteLength} bytes, over the upload budget`);
      }

      const req = await runPre(this.plugins, { imageDataUri: toDataUri(jpeg), prompt: this.config.prompt });
      const content = await this.complete(apiKey, fetch, req);
      if (content === undefined) {
        return { kind: "transport-error", message: "Unexpected response shape from inference endpoint" };
      }

      return { kind: "success", analysis: await runPost(this.plugins, content, req) };
    } catch (err) {
      if (err instanceof APIError && !(err instanceof APIConnectionError) && typeof err.status === "number") {
        const rejection = seen.last?.status === err.status ? seen.last : undefined;
        return { kind: "provider-error", status: err.status, body: rejection?.body ?? err.message };
      }

      console.error("ANALYZE ERROR:", err);
      return { kind: "transport-error", message: err instanceof Error ? err.message : String(err) };
    }
  }

  private async complete(apiKey: string, fetch: Fetch, req: AnalysisRequest): Promise<string | undefined> {
    const openai = new OpenAI({
      apiKey,
      baseURL: this.config.baseURL,
      timeout: this.config.timeoutMs,
      maxRetries: 0,
      defaultHeaders: attributionHeaders(this.config),
      fetch,
    });

    const completion = await openai.chat.completions.create({
      model: this.config.model,
      messages: [
        {
          role: "user",
          content: [
            { type: "text", text: req.prompt },
            { type: "image_url", image_url: { url: req.imageDataUri } },
          ],
        },
      ],
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
    });

    const parsed = completionSchema.safeParse(completion);
    return parsed.success ? parsed.data.choices[0].message.content : undefined;
  }
}
