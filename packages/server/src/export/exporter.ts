/**
 * Writes a generated image to disk in the requested format. The file name's
 * extension is adjusted to match the bytes written.
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  type ExportRequest,
  type ExportSummary,
  withFormatExtension,
} from "@qr-studio/shared";
import { WriteError } from "../qr/errors.js";
import type { GeneratedImage } from "../qr/generator.js";
import { encodeRaster } from "../qr/raster.js";

export interface ImageWriter {
  write(filePath: string, data: Buffer): Promise<void>;
}

/**
 * Plain file write. Parent directories are not created: a missing
 * directory is reported as a write failure.
 */
export const fileImageWriter: ImageWriter = {
  write: (filePath, data) => fs.writeFile(filePath, data),
};

export interface ExportOptions {
  writer?: ImageWriter;
  /** Base directory for relative target paths (default: cwd) */
  exportDir?: string;
  jpegQuality?: number;
}

export async function exportImage(
  image: GeneratedImage,
  request: ExportRequest,
  options: ExportOptions = {},
): Promise<ExportSummary> {
  const targetPath = request.targetPath.trim();
  if (!targetPath) {
    throw new WriteError(request.targetPath, "Export path is empty");
  }

  const resolved = path.resolve(
    options.exportDir ?? process.cwd(),
    withFormatExtension(targetPath, request.format),
  );
  const data = encodeRaster(image.bitmap, request.format, {
    jpegQuality: options.jpegQuality,
  });

  try {
    await (options.writer ?? fileImageWriter).write(resolved, data);
  } catch (error) {
    throw new WriteError(resolved, error);
  }

  return { path: resolved, format: request.format, bytes: data.length };
}
