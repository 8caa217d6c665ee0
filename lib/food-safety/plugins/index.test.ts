import { describe, expect, it } from "vitest";
import { EMPTY_ANALYSIS_FALLBACK, runPost, runPre, tidyAnalysisPlugin, type AnalysisPlugin } from "./index";

const req = { imageDataUri: "data:image/jpeg;base64,AAAA", prompt: "Check this." };

describe("plugin pipeline", () => {
  it("runs plugins by ascending order, unordered ones last", async () => {
    const calls: string[] = [];
    const plugin = (name: string, order?: number): AnalysisPlugin => ({
      name,
      order,
      postprocess: (analysis) => {
        calls.push(name);
        return `${analysis}>${name}`;
      },
    });

    const out = await runPost([plugin("late"), plugin("first", 1), plugin("second", 50)], "start", req);

    expect(out).toBe("start>first>second>late");
    expect(calls).toEqual(["first", "second", "late"]);
  });

  it("threads the request through preprocess hooks", async () => {
    const plugins: AnalysisPlugin[] = [
      { name: "a", order: 1, preprocess: (r) => ({ ...r, prompt: `${r.prompt} Be brief.` }) },
      { name: "b", order: 2, preprocess: async (r) => ({ ...r, prompt: r.prompt.toUpperCase() }) },
    ];

    expect(await runPre(plugins, req)).toEqual({ ...req, prompt: "CHECK THIS. BE BRIEF." });
  });

  it("leaves the request alone without plugins", async () => {
    expect(await runPre([], req)).toBe(req);
  });
});

describe("tidyAnalysisPlugin", () => {
  it("trims and replaces empty answers", async () => {
    expect(await runPost([tidyAnalysisPlugin], "\n  Contains raw egg.  ", req)).toBe("Contains raw egg.");
    expect(await runPost([tidyAnalysisPlugin], " \n ", req)).toBe(EMPTY_ANALYSIS_FALLBACK);
  });
});
