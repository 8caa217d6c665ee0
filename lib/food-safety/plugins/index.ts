import type { AnalysisPlugin, AnalysisRequest } from "./types";
import { tidyAnalysisPlugin } from "./base";

export const defaultPlugins: AnalysisPlugin[] = [tidyAnalysisPlugin];

function ordered(plugins: AnalysisPlugin[]) {
  return [...plugins].sort((a, b) => (a.order ?? 100) - (b.order ?? 100));
}

export async function runPre(plugins: AnalysisPlugin[], req: AnalysisRequest): Promise<AnalysisRequest> {
  let current = req;
  for (const p of ordered(plugins)) {
    if (p.preprocess) current = await p.preprocess(current);
  }
  return current;
}

export async function runPost(plugins: AnalysisPlugin[], analysis: string, req: AnalysisRequest): Promise<string> {
  let current = analysis;
  for (const p of ordered(plugins)) {
    if (p.postprocess) current = await p.postprocess(current, req);
  }
  return current;
}

export type { AnalysisPlugin, AnalysisRequest } from "./types";
export { tidyAnalysisPlugin, EMPTY_ANALYSIS_FALLBACK } from "./base";
