"use client";

import { useEffect, useRef, useState } from "react";
import { SUPPORTED_FORMATS } from "../lib/food-safety/config";
import type { AnalysisOutcome } from "../lib/food-safety/result";

type AnalyzeResponse = AnalysisOutcome & { notice: string };

const ACCEPT = SUPPORTED_FORMATS.map((f) => `.${f}`).join(",");

export default function Home() {
  const videoRef = useRef<HTMLVideoElement>(null);
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const requestIdRef = useRef(0);

  const [upload, setUpload] = useState<File | null>(null);
  const [photo, setPhoto] = useState<Blob | null>(null);
  const [previewUrl, setPreviewUrl] = useState<string | null>(null);
  const [cameraOn, setCameraOn] = useState(false);
  const [busy, setBusy] = useState(false);
  const [analysis, setAnalysis] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  // upload takes precedence over a captured photo
  const selected = upload ?? photo;

  useEffect(() => () => stopCamera(), []);

  useEffect(() => {
    if (!selected) {
      setPreviewUrl(null);
      return;
    }
    const url = URL.createObjectURL(selected);
    setPreviewUrl(url);
    return () => URL.revokeObjectURL(url);
  }, [selected]);

  useEffect(() => {
    if (upload || photo) void analyze(upload, photo);
  }, [upload, photo]);

  // ---------------- CAMERA ----------------
  async function startCamera() {
    if (!navigator.mediaDevices?.getUserMedia) {
      throw new Error("Camera not supported");
    }

    let stream: MediaStream;
    try {
      stream = await navigator.mediaDevices.getUserMedia({
        video: { facingMode: { ideal: "environment" } },
        audio: false,
      });
    } catch {
      stream = await navigator.mediaDevices.getUserMedia({ video: true, audio: false });
    }

    const video = videoRef.current;
    if (!video) throw new Error("Camera preview unavailable");
    video.srcObject = stream;
    video.setAttribute("playsinline", "true");

    await new Promise<void>((r) => (video.onloadedmetadata = () => r()));
    await video.play();
  }

  function stopCamera() {
    const stream = videoRef.current?.srcObject;
    if (stream instanceof MediaStream) stream.getTracks().forEach((t) => t.stop());
    if (videoRef.current) videoRef.current.srcObject = null;
  }

  // ---------------- FRAME ----------------
  function captureFrame(): Promise<Blob | null> {
    const v = videoRef.current;
    const c = canvasRef.current;
    if (!v || !c || v.readyState < 2 || !v.videoWidth || !v.videoHeight) {
      return Promise.resolve(null);
    }

    c.width = v.videoWidth;
    c.height = v.videoHeight;

    const ctx = c.getContext("2d");
    if (!ctx) return Promise.resolve(null);

    ctx.drawImage(v, 0, 0, c.width, c.height);
    return new Promise((r) => c.toBlob(r, "image/jpeg", 0.92));
  }

  // ---------------- ANALYZE (LATEST ONLY) ----------------
  async function analyze(uploadFile: File | null, photoBlob: Blob | null) {
    const requestId = ++requestIdRef.current;

    const form = new FormData();
    if (uploadFile) form.append("upload", uploadFile);
    if (photoBlob) form.append("camera", photoBlob, "photo.jpg");

    setBusy(true);
    setAnalysis(null);
    setError(null);

    try {
      const res = await fetch("/api/analyze", { method: "POST", body: form });
      const data: AnalyzeResponse = await res.json();
      if (requestId !== requestIdRef.current) return;

      if (data.kind === "success") setAnalysis(data.analysis);
      else setError(data.notice);
    } catch (e) {
      if (requestId === requestIdRef.current) {
        setError(e instanceof Error ? e.message : "Analysis failed. Please try again.");
      }
    } finally {
      if (requestId === requestIdRef.current) setBusy(false);
    }
  }

  async function onStartCamera() {
    try {
      await startCamera();
      setCameraOn(true);
      setError(null);
    } catch (e) {
      setError(e instanceof Error ? e.message : "Camera not available");
    }
  }

  function onStopCamera() {
    stopCamera();
    setCameraOn(false);
  }

  async function onTakePhoto() {
    const blob = await captureFrame();
    if (blob) setPhoto(blob);
    else setError("Error processing photo");
  }

  return (
    <main className="container">
      <header className="header">
        <h1>Food Safety Analyzer</h1>
        <p className="sub">Upload or snap a photo of your food → check for unsafe ingredients</p>
      </header>

      <div className="grid">
        <section className="card">
          <div className="captionLabel">Upload Image</div>
          <input
            type="file"
            accept={ACCEPT}
            onChange={(e) => setUpload(e.target.files?.[0] ?? null)}
          />
          <p className="sub">Limit 20MB per file · {SUPPORTED_FORMATS.join(", ").toUpperCase()}</p>
        </section>

        <section className="card">
          <div className="captionLabel">Take Photo</div>
          <div className={cameraOn ? "videoWrap" : "hidden"}>
            <video ref={videoRef} className="video" muted playsInline />
          </div>
          <canvas ref={canvasRef} className="hidden" />

          <div className="controls">
            {!cameraOn ? (
              <button className="btn" onClick={onStartCamera}>
                Start camera
              </button>
            ) : (
              <>
                <button className="btn primary" onClick={onTakePhoto} disabled={busy}>
                  Take Photo
                </button>
                <button className="btn danger" onClick={onStopCamera}>
                  Stop
                </button>
              </>
            )}
            {photo && (
              <button className="btn" onClick={() => setPhoto(null)} disabled={busy}>
                Clear photo
              </button>
            )}
          </div>
        </section>
      </div>

      {selected && (
        <section>
          <p className="status">{upload ? "✅ Image loaded" : "✅ Photo captured"}</p>
          {previewUrl && <img src={previewUrl} alt="Selected food" className="preview" />}
        </section>
      )}

      {busy && <p className="sub">🔍 Analyzing…</p>}

      {analysis && (
        <section className="caption">
          <div className="captionLabel">🏥 Analysis Results</div>
          <div className="captionText">{analysis}</div>
        </section>
      )}

      {error && <div className="error">❌ {error}</div>}

      <footer className="footer">🍎 Always consult healthcare professionals for medical advice</footer>
    </main>
  );
}
