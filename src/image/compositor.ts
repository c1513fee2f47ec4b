import sharp from "sharp";
import type { AspectRatio } from "../config.js";

/** Colour layout of a decoded capture, as far as compositing cares. */
export type ColorMode = "palette" | "gray" | "gray-alpha" | "rgb" | "rgba";

export type OutputMode = "rgb" | "rgba";

export interface RawCapture {
  bytes: Buffer;
  width: number;
  height: number;
  colorMode: ColorMode;
}

export interface CompositedImage {
  /** PNG-encoded raster. */
  data: Buffer;
  width: number;
  height: number;
  colorMode: OutputMode;
}

export type ComposeFailureKind = "invalid-image" | "composition-error";

export type ComposeResult =
  | { ok: true; image: CompositedImage }
  | { ok: false; kind: ComposeFailureKind; message: string };

export interface ComposeOptions {
  paddingPx?: number;
  aspectRatio?: AspectRatio;
}

export interface ComposedSize {
  width: number;
  height: number;
  targetHeight: number;
  cropped: boolean;
}

const DEFAULT_PADDING_PX = 2;
const DEFAULT_ASPECT_RATIO: AspectRatio = { width: 4, height: 3 };
const WHITE = { r: 255, g: 255, b: 255, alpha: 1 };

/**
 * Output dimensions for a capture of `width`×`height`.
 *
 * The width always grows by the padding on both sides. The height is only
 * ever reduced: it is cut to the aspect-ratio frame when the capture is
 * taller than the frame, and left alone otherwise.
 */
export function composedSize(
  width: number,
  height: number,
  paddingPx: number,
  aspectRatio: AspectRatio
): ComposedSize {
  const paddedWidth = width + 2 * paddingPx;
  const targetHeight = Math.floor(
    (paddedWidth * aspectRatio.height) / aspectRatio.width
  );
  const cropped = height > targetHeight;

  return {
    width: paddedWidth,
    height: cropped ? targetHeight : height,
    targetHeight,
    cropped,
  };
}

export function normalizedMode(mode: ColorMode): OutputMode {
  switch (mode) {
    case "palette":
    case "gray-alpha":
    case "rgba":
      return "rgba";
    case "gray":
    case "rgb":
      return "rgb";
  }
}

function colorModeOf(meta: sharp.Metadata): ColorMode {
  if (meta.isPalette) return "palette";
  if (meta.space === "b-w" || meta.space === "grey16") {
    return meta.hasAlpha ? "gray-alpha" : "gray";
  }
  return meta.hasAlpha ? "rgba" : "rgb";
}

export async function decodeCapture(
  bytes: Buffer
): Promise<RawCapture | undefined> {
  try {
    const meta = await sharp(bytes).metadata();
    return {
      bytes,
      width: meta.width ?? 0,
      height: meta.height ?? 0,
      colorMode: colorModeOf(meta),
    };
  } catch {
    return undefined;
  }
}

/**
 * Pad a captured region with a white margin left and right, then cut it
 * to the aspect-ratio frame from the top.
 *
 * Cropping the source rows before extending is equivalent to pasting onto
 * a white canvas and cropping that, since the margin is horizontal only.
 */
export async function compose(
  rawBytes: Buffer,
  options: ComposeOptions = {}
): Promise<ComposeResult> {
  const paddingPx = options.paddingPx ?? DEFAULT_PADDING_PX;
  const aspectRatio = options.aspectRatio ?? DEFAULT_ASPECT_RATIO;

  const raw = await decodeCapture(rawBytes);
  if (!raw) {
    return {
      ok: false,
      kind: "invalid-image",
      message: "Could not decode screenshot bytes",
    };
  }
  if (raw.width <= 0 || raw.height <= 0) {
    return {
      ok: false,
      kind: "invalid-image",
      message: `Invalid image dimensions (${raw.width}x${raw.height})`,
    };
  }

  const colorMode = normalizedMode(raw.colorMode);
  const size = composedSize(raw.width, raw.height, paddingPx, aspectRatio);

  try {
    let pipeline = sharp(raw.bytes);
    if (colorMode === "rgba") {
      pipeline = pipeline.ensureAlpha();
    }
    pipeline = pipeline.toColourspace("srgb");

    if (size.cropped) {
      pipeline = pipeline.extract({
        left: 0,
        top: 0,
        width: raw.width,
        height: size.height,
      });
    }
    if (paddingPx > 0) {
      pipeline = pipeline.extend({
        top: 0,
        bottom: 0,
        left: paddingPx,
        right: paddingPx,
        background: WHITE,
      });
    }

    const data = await pipeline.png().toBuffer();
    return {
      ok: true,
      image: { data, width: size.width, height: size.height, colorMode },
    };
  } catch (error) {
    return {
      ok: false,
      kind: "composition-error",
      message: error instanceof Error ? error.message : String(error),
    };
  }
}
