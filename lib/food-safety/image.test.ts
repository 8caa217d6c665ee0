import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { boundedSize, decodeImage, exceedsByteBudget, normalizeImage, toDataUri, type SourceImage } from "./image";

function rgbaPng(width: number, height: number) {
  return sharp({
    create: { width, height, channels: 4, background: { r: 200, g: 120, b: 40, alpha: 0.5 } },
  })
    .png()
    .toBuffer();
}

function rawImage(width: number, height: number, channels: SourceImage["channels"]): SourceImage {
  return { pixels: Buffer.alloc(width * height * channels, 128), width, height, channels };
}

describe("boundedSize", () => {
  it("keeps images inside the bound", () => {
    expect(boundedSize(800, 600, 1024)).toEqual({ width: 800, height: 600 });
    expect(boundedSize(1024, 1024, 1024)).toEqual({ width: 1024, height: 1024 });
  });

  it("scales the longer side down to the bound", () => {
    expect(boundedSize(3000, 2000, 1024)).toEqual({ width: 1024, height: 683 });
    expect(boundedSize(2000, 3000, 1024)).toEqual({ width: 683, height: 1024 });
    expect(boundedSize(2048, 1024, 1024)).toEqual({ width: 1024, height: 512 });
  });

  it("never collapses a side to zero", () => {
    expect(boundedSize(5000, 1, 1024)).toEqual({ width: 1024, height: 1 });
  });
});

describe("decodeImage", () => {
  it("reads dimensions and channels", async () => {
    const image = await decodeImage(await rgbaPng(30, 20));
    expect(image.width).toBe(30);
    expect(image.height).toBe(20);
    expect(image.channels).toBe(4);
    expect(image.pixels.byteLength).toBe(30 * 20 * 4);
  });

  it("rejects bytes that are not an image", async () => {
    await expect(decodeImage(Buffer.from("definitely not an image"))).rejects.toThrow();
  });
});

describe("normalizeImage", () => {
  it("bounds large RGBA images to a 1024 JPEG with three channels", async () => {
    const source = await decodeImage(await rgbaPng(3000, 2000));
    const meta = await sharp(await normalizeImage(source)).metadata();

    expect(meta.format).toBe("jpeg");
    expect(meta.width).toBe(1024);
    expect(meta.height).toBe(683);
    expect(meta.channels).toBe(3);
  });

  it("leaves small images at their original size", async () => {
    const meta = await sharp(await normalizeImage(rawImage(640, 480, 3))).metadata();
    expect(meta.width).toBe(640);
    expect(meta.height).toBe(480);
  });

  it("drops alpha from grey images with transparency", async () => {
    const meta = await sharp(await normalizeImage(rawImage(16, 16, 2))).metadata();
    expect(meta.channels).toBe(3);
  });

  it("expands palette images to three channels", async () => {
    const palette = await sharp({
      create: { width: 40, height: 40, channels: 3, background: { r: 10, g: 200, b: 90 } },
    })
      .png({ palette: true })
      .toBuffer();

    const meta = await sharp(await normalizeImage(await decodeImage(palette))).metadata();
    expect(meta.channels).toBe(3);
  });

  it("is deterministic", async () => {
    const source = await decodeImage(await rgbaPng(1500, 900));
    const first = await normalizeImage(source);
    const second = await normalizeImage(source);
    expect(first.equals(second)).toBe(true);
  });

  it("honours custom bounds", async () => {
    const meta = await sharp(
      await normalizeImage(rawImage(400, 200, 3), { maxDimension: 100, quality: 50 })
    ).metadata();
    expect(meta.width).toBe(100);
    expect(meta.height).toBe(50);
  });
});

describe("toDataUri", () => {
  it("prefixes a JPEG media type and round-trips the bytes", () => {
    const bytes = Buffer.from([0xff, 0xd8, 0xff, 0x00, 0x10, 0x7f]);
    const uri = toDataUri(bytes);

    expect(uri.startsWith("data:image/jpeg;base64,")).toBe(true);
    const decoded = Buffer.from(uri.slice("data:image/jpeg;base64,".length), "base64");
    expect(decoded.equals(bytes)).toBe(true);
  });
});

describe("exceedsByteBudget", () => {
  it("compares against the budget", () => {
    expect(exceedsByteBudget(new Uint8Array(5), 4)).toBe(true);
    expect(exceedsByteBudget(new Uint8Array(4), 4)).toBe(false);
    expect(exceedsByteBudget(new Uint8Array(1024))).toBe(false);
  });
});
