import { NextResponse } from "next/server";
import type { Analyzer } from "./client";
import { MAX_IMAGE_BYTES, SUPPORTED_FORMATS, SUPPORTED_MEDIA_TYPES } from "./config";
import { decodeImage, type SourceImage } from "./image";
import { describeOutcome, type AnalysisOutcome } from "./result";

export type ImageSource = "upload" | "camera";

const INPUT_ERRORS: Record<ImageSource, string> = {
  upload: "Error loading image",
  camera: "Error processing photo",
};

const STATUS_BY_KIND: Record<AnalysisOutcome["kind"], number> = {
  success: 200,
  "input-error": 400,
  "configuration-error": 500,
  "provider-error": 502,
  "transport-error": 502,
};

function isSupported(file: Blob & { name?: string }) {
  if ((SUPPORTED_MEDIA_TYPES as readonly string[]).includes(file.type)) return true;
  const ext = file.name?.split(".").pop()?.toLowerCase() ?? "";
  return (SUPPORTED_FORMATS as readonly string[]).includes(ext);
}

function respond(outcome: AnalysisOutcome) {
  return NextResponse.json(
    { ...outcome, notice: describeOutcome(outcome) },
    { status: STATUS_BY_KIND[outcome.kind] }
  );
}

/** Upload wins over a captured photo when both are sent. */
export function pickImage(form: FormData): { source: ImageSource; file: File } | null {
  for (const source of ["upload", "camera"] as const) {
    const value = form.get(source);
    if (value !== null && typeof value !== "string" && value.size > 0) return { source, file: value };
  }
  return null;
}

export function createAnalyzeHandler(analyzer: Analyzer) {
  return async function handleAnalyze(req: Request): Promise<Response> {
    let form: FormData;
    try {
      form = await req.formData();
    } catch {
      return respond({ kind: "input-error", message: "Expected a multipart form with an image" });
    }

    const picked = pickImage(form);
    if (!picked) {
      return respond({ kind: "input-error", message: "No image provided" });
    }

    const { source, file } = picked;
    if (!isSupported(file)) {
      return respond({
        kind: "input-error",
        message: `Unsupported image type. Use one of: ${SUPPORTED_FORMATS.join(", ")}`,
      });
    }
    if (file.size > MAX_IMAGE_BYTES) {
      return respond({ kind: "input-error", message: "Image is larger than 20MB" });
    }

    let image: SourceImage;
    try {
      image = await decodeImage(Buffer.from(await file.arrayBuffer()));
    } catch (err) {
      console.error("DECODE ERROR:", err);
      return respond({ kind: "input-error", message: INPUT_ERRORS[source] });
    }

    return respond(await analyzer.analyze(image));
  };
}
