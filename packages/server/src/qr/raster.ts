/**
 * RGBA raster helpers: paint a module matrix, scale for preview, encode to
 * PNG or JPG bytes.
 */

import type { ExportFormat } from "@qr-studio/shared";
import jpeg from "jpeg-js";
import { PNG } from "pngjs";
import type { ModuleMatrix } from "./encoder.js";

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/** Row-major RGBA pixels, 4 bytes per pixel, always opaque */
export interface RasterImage {
  width: number;
  height: number;
  data: Buffer;
}

export interface RenderOptions {
  /** Pixels per module */
  moduleSize: number;
  /** Quiet zone width in modules */
  border: number;
  foreground: Rgb;
  background: Rgb;
}

export const BLACK: Rgb = { r: 0, g: 0, b: 0 };
export const WHITE: Rgb = { r: 255, g: 255, b: 255 };
export const DEFAULT_BORDER = 4;
export const DEFAULT_JPEG_QUALITY = 90;

/**
 * Parse "#rrggbb" or "#rgb". Returns null for anything else.
 */
export function parseHexColor(value: string): Rgb | null {
  const match = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(value.trim());
  const hex = match?.[1];
  if (!hex) return null;
  const full =
    hex.length === 3
      ? hex
          .split("")
          .map((ch) => ch + ch)
          .join("")
      : hex;
  return {
    r: Number.parseInt(full.slice(0, 2), 16),
    g: Number.parseInt(full.slice(2, 4), 16),
    b: Number.parseInt(full.slice(4, 6), 16),
  };
}

export function renderMatrix(
  matrix: ModuleMatrix,
  options: RenderOptions,
): RasterImage {
  const { moduleSize, border, foreground, background } = options;
  const side = (matrix.size + border * 2) * moduleSize;
  const data = Buffer.alloc(side * side * 4);

  for (let y = 0; y < side; y++) {
    const row = matrix.modules[Math.floor(y / moduleSize) - border];
    for (let x = 0; x < side; x++) {
      const dark = row?.[Math.floor(x / moduleSize) - border] === true;
      const color = dark ? foreground : background;
      const offset = (y * side + x) * 4;
      data[offset] = color.r;
      data[offset + 1] = color.g;
      data[offset + 2] = color.b;
      data[offset + 3] = 255;
    }
  }

  return { width: side, height: side, data };
}

/**
 * Nearest-neighbour scale, which keeps module edges crisp.
 */
export function resizeNearest(
  image: RasterImage,
  width: number,
  height: number,
): RasterImage {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    const srcY = Math.min(image.height - 1, Math.floor((y * image.height) / height));
    for (let x = 0; x < width; x++) {
      const srcX = Math.min(image.width - 1, Math.floor((x * image.width) / width));
      const src = (srcY * image.width + srcX) * 4;
      image.data.copy(data, (y * width + x) * 4, src, src + 4);
    }
  }
  return { width, height, data };
}

export function encodeRaster(
  image: RasterImage,
  format: ExportFormat,
  options: { jpegQuality?: number } = {},
): Buffer {
  if (format === "JPG") {
    const encoded = jpeg.encode(
      { data: image.data, width: image.width, height: image.height },
      options.jpegQuality ?? DEFAULT_JPEG_QUALITY,
    );
    return encoded.data;
  }

  const png = new PNG({ width: image.width, height: image.height });
  image.data.copy(png.data);
  return PNG.sync.write(png);
}
