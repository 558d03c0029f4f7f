import { z } from "zod";

export const EXPORT_FORMATS = ["PNG", "JPG"] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const EXPORT_FORMAT_EXTENSIONS: Record<ExportFormat, string> = {
  PNG: ".png",
  JPG: ".jpg",
};

export const ExportFormatSchema = z.enum(EXPORT_FORMATS);

export const ExportRequestSchema = z.object({
  targetPath: z.string().trim().min(1, "targetPath is required"),
  format: ExportFormatSchema,
});

export type ExportRequest = z.infer<typeof ExportRequestSchema>;

/**
 * Map a file extension to an export format.
 * Returns null for anything that is not .png, .jpg or .jpeg.
 */
export function formatFromExtension(filePath: string): ExportFormat | null {
  const match = /\.([A-Za-z0-9]+)$/.exec(filePath);
  const ext = match?.[1]?.toLowerCase();
  if (ext === "png") return "PNG";
  if (ext === "jpg" || ext === "jpeg") return "JPG";
  return null;
}

/**
 * Make the file name's extension agree with the format that will be written.
 *
 * - `qr` and `qr.` get the format's extension appended.
 * - An image extension naming the other format is replaced (`qr.png` as JPG
 *   becomes `qr.jpg`). `.jpeg` is kept for JPG.
 * - Any other extension is kept and the format's extension is appended
 *   (`qr.v2` as PNG becomes `qr.v2.png`).
 */
export function withFormatExtension(
  filePath: string,
  format: ExportFormat,
): string {
  const baseName = filePath.split(/[\\/]/).pop() ?? "";
  const current = formatFromExtension(baseName);
  if (current === format) {
    return filePath;
  }

  const extension = EXPORT_FORMAT_EXTENSIONS[format];
  if (current) {
    return filePath.replace(/\.[A-Za-z0-9]+$/, extension);
  }
  return `${filePath.replace(/\.$/, "")}${extension}`;
}
