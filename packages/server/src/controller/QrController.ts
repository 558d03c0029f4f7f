/**
 * QrController owns the interactive state of the app: the draft the user is
 * editing, the last generated image and its preview, and the status line.
 *
 * States:
 * - IDLE: no image yet. Export fails with NoImageError.
 * - GENERATED: an image matching the last successful generation is held.
 *   Regenerating replaces it wholesale; failures leave it untouched.
 *
 * Draft changes never regenerate. The held image goes stale until the user
 * asks for a new one, and export writes the stale image as it was made.
 */

import {
  type ControllerSnapshot,
  type ControllerState,
  DEFAULT_SETTINGS,
  type ErrorSummary,
  type ExportFormat,
  type ExportRequest,
  type ExportSummary,
  type ImageSummary,
  type Settings,
  type StatusMessage,
} from "@qr-studio/shared";
import type { Logger } from "pino";
import { type ImageWriter, exportImage } from "../export/exporter.js";
import { getLogger } from "../logging/logger.js";
import { NoImageError, type QrStudioError, isQrStudioError } from "../qr/errors.js";
import type { GeneratedImage, ImageGenerator } from "../qr/generator.js";
import { encodeRaster, resizeNearest } from "../qr/raster.js";

export type ActionResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: QrStudioError };

export interface QrControllerOptions {
  generator: ImageGenerator;
  /** Defaults to writing files with fs */
  writer?: ImageWriter;
  /** Base directory for relative export paths */
  exportDir?: string;
  /** Preview side length in pixels (default: 250) */
  previewSize?: number;
  jpegQuality?: number;
  /** Settings the draft starts with */
  initialSettings?: Settings;
  logger?: Logger;
}

const STATUS_PREVIEW_CHARS = 30;
const READY_STATUS: StatusMessage = { level: "info", text: "Ready" };

export class QrController {
  private readonly generator: ImageGenerator;
  private readonly writer: ImageWriter | undefined;
  private readonly exportDir: string | undefined;
  private readonly previewSize: number;
  private readonly jpegQuality: number | undefined;
  private readonly log: Logger;

  private text = "";
  private settings: Settings;
  private image: GeneratedImage | null = null;
  private previewPng: Buffer | null = null;
  private revision = 0;
  private status: StatusMessage = READY_STATUS;
  private lastError: ErrorSummary | null = null;

  constructor(options: QrControllerOptions) {
    this.generator = options.generator;
    this.writer = options.writer;
    this.exportDir = options.exportDir;
    this.previewSize = options.previewSize ?? 250;
    this.jpegQuality = options.jpegQuality;
    this.settings = { ...(options.initialSettings ?? DEFAULT_SETTINGS) };
    this.log =
      options.logger ?? getLogger().child({ component: "qr-controller" });
  }

  get state(): ControllerState {
    return this.image ? "GENERATED" : "IDLE";
  }

  getSnapshot(): ControllerSnapshot {
    return {
      state: this.state,
      text: this.text,
      settings: { ...this.settings },
      image: this.image ? this.summarize(this.image) : null,
      status: { ...this.status },
      lastError: this.lastError ? { ...this.lastError } : null,
    };
  }

  /**
   * Record what the user typed or picked. Does not touch the held image.
   */
  updateDraft(draft: { text?: string; settings?: Partial<Settings> }): void {
    if (draft.text !== undefined) {
      this.text = draft.text;
    }
    if (draft.settings) {
      this.updateSettings(draft.settings);
    }
  }

  updateSettings(settings: Partial<Settings>): void {
    this.settings = {
      errorCorrectionLevel:
        settings.errorCorrectionLevel ?? this.settings.errorCorrectionLevel,
      moduleSize: settings.moduleSize ?? this.settings.moduleSize,
    };
    this.log.debug({ settings: this.settings }, "Draft settings updated");
  }

  onGenerateRequested(
    text: string,
    settings: Settings,
  ): ActionResult<GeneratedImage> {
    this.text = text;
    this.settings = { ...settings };

    let image: GeneratedImage;
    let previewPng: Buffer;
    try {
      image = this.generator.generate(text, this.settings);
      previewPng = encodeRaster(
        resizeNearest(image.bitmap, this.previewSize, this.previewSize),
        "PNG",
      );
    } catch (error) {
      return this.fail(error, "generate");
    }

    this.image = image;
    this.previewPng = previewPng;
    this.revision += 1;
    this.lastError = null;
    this.status = {
      level: "success",
      text: `Generated QR code for: ${truncate(text.trim(), STATUS_PREVIEW_CHARS)}`,
    };
    this.log.info(
      {
        revision: this.revision,
        version: image.version,
        width: image.width,
        settings: image.settings,
      },
      "QR code generated",
    );
    return { ok: true, value: image };
  }

  generateFromDraft(): ActionResult<GeneratedImage> {
    return this.onGenerateRequested(this.text, this.settings);
  }

  async onExportRequested(
    request: ExportRequest,
  ): Promise<ActionResult<ExportSummary>> {
    // Captured before awaiting: a regeneration during the write must not
    // change what this export produces.
    const image = this.image;
    if (!image) {
      return this.fail(new NoImageError(), "export");
    }

    let summary: ExportSummary;
    try {
      summary = await exportImage(image, request, {
        writer: this.writer,
        exportDir: this.exportDir,
        jpegQuality: this.jpegQuality,
      });
    } catch (error) {
      return this.fail(error, "export");
    }

    this.lastError = null;
    this.status = { level: "success", text: `Saved to: ${summary.path}` };
    this.log.info(
      { path: summary.path, format: summary.format, bytes: summary.bytes },
      "QR code exported",
    );
    return { ok: true, value: summary };
  }

  /** Scaled preview as PNG, or null before the first generation */
  getPreviewPng(): Buffer | null {
    return this.previewPng;
  }

  /** Full-size image in the given format, or null before the first generation */
  renderImage(format: ExportFormat): Buffer | null {
    if (!this.image) return null;
    return encodeRaster(this.image.bitmap, format, {
      jpegQuality: this.jpegQuality,
    });
  }

  private summarize(image: GeneratedImage): ImageSummary {
    return {
      text: image.text,
      settings: { ...image.settings },
      version: image.version,
      moduleCount: image.moduleCount,
      width: image.width,
      height: image.height,
      revision: this.revision,
      createdAt: image.createdAt.toISOString(),
    };
  }

  private fail(
    error: unknown,
    action: "generate" | "export",
  ): { ok: false; error: QrStudioError } {
    if (!isQrStudioError(error)) {
      throw error;
    }
    this.lastError = error.toSummary();
    this.status = {
      level:
        error.kind === "EmptyInputError" || error.kind === "NoImageError"
          ? "warning"
          : "error",
      text: error.message,
    };
    this.log.warn({ err: error, kind: error.kind, action }, "Action failed");
    return { ok: false, error };
  }
}

function truncate(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}
