export type AnalysisSuccess = { kind: "success"; analysis: string };
export type ConfigurationError = { kind: "configuration-error"; message: string };
export type ProviderError = { kind: "provider-error"; status: number; body: string };
export type TransportError = { kind: "transport-error"; message: string };
export type InputError = { kind: "input-error"; message: string };

export type AnalysisResult = AnalysisSuccess | ConfigurationError | ProviderError | TransportError;

// what the route can answer with: the client's result, or a rejected input
export type AnalysisOutcome = AnalysisResult | InputError;

export const MISSING_KEY_MESSAGE =
  "OpenRouter API key not found. Please set OPENROUTER_API_KEY in your .env file.";

export function describeOutcome(outcome: AnalysisOutcome): string {
  switch (outcome.kind) {
    case "success":
      return outcome.analysis;
    case "configuration-error":
      return outcome.message;
    case "provider-error":
      return `API Error: ${outcome.status} - ${outcome.body}`;
    case "transport-error":
      return `Error analyzing image: ${outcome.message}`;
    case "input-error":
      return outcome.message;
  }
}
