import type { Settings } from "@qr-studio/shared";
import { encodeMatrix } from "./encoder.js";
import { EmptyInputError } from "./errors.js";
import {
  BLACK,
  DEFAULT_BORDER,
  type RasterImage,
  type Rgb,
  renderMatrix,
  WHITE,
} from "./raster.js";

/**
 * A rendered QR code. Pixels are kept as RGBA and encoded to PNG or JPG
 * only when previewed or exported.
 */
export interface GeneratedImage {
  format: "png";
  text: string;
  settings: Settings;
  version: number;
  moduleCount: number;
  width: number;
  height: number;
  bitmap: RasterImage;
  createdAt: Date;
}

/** Appearance fixed by configuration rather than by the user */
export interface AppearanceOptions {
  border?: number;
  foreground?: Rgb;
  background?: Rgb;
}

export interface ImageGenerator {
  generate(text: string, settings: Settings): GeneratedImage;
}

/**
 * Encode `text` and paint it. Throws EmptyInputError for blank text and
 * EncodingError when the text does not fit a QR symbol at the chosen level.
 */
export function generateQrImage(
  text: string,
  settings: Settings,
  appearance: AppearanceOptions = {},
): GeneratedImage {
  if (!text.trim()) {
    throw new EmptyInputError();
  }

  const matrix = encodeMatrix(text, settings.errorCorrectionLevel);
  const bitmap = renderMatrix(matrix, {
    moduleSize: settings.moduleSize,
    border: appearance.border ?? DEFAULT_BORDER,
    foreground: appearance.foreground ?? BLACK,
    background: appearance.background ?? WHITE,
  });

  return {
    format: "png",
    text,
    settings: { ...settings },
    version: matrix.version,
    moduleCount: matrix.size,
    width: bitmap.width,
    height: bitmap.height,
    bitmap,
    createdAt: new Date(),
  };
}

export function createImageGenerator(
  appearance: AppearanceOptions = {},
): ImageGenerator {
  return {
    generate: (text, settings) => generateQrImage(text, settings, appearance),
  };
}
