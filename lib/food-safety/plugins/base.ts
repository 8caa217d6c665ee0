import type { AnalysisPlugin } from "./types";

export const EMPTY_ANALYSIS_FALLBACK = "The model did not return an assessment for this image.";

/**
 * Trims the model's answer and never hands back an empty string.
 */
export const tidyAnalysisPlugin: AnalysisPlugin = {
  name: "tidy",
  order: 10,
  postprocess: async (analysis: string) => {
    const text = analysis.trim();
    return text.length ? text : EMPTY_ANALYSIS_FALLBACK;
  },
};
