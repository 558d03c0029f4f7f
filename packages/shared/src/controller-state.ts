import type { ExportFormat } from "./export.js";
import type { Settings } from "./settings.js";

/**
 * Controller lifecycle.
 * - IDLE: nothing generated yet, export is refused
 * - GENERATED: an image matching the last generation request is held
 */
export type ControllerState = "IDLE" | "GENERATED";

export type QrErrorKind =
  | "EmptyInputError"
  | "EncodingError"
  | "NoImageError"
  | "WriteError";

export type StatusLevel = "info" | "success" | "warning" | "error";

export interface StatusMessage {
  level: StatusLevel;
  text: string;
}

/** What the client needs to know about the held image, without pixels */
export interface ImageSummary {
  /** Text the image encodes */
  text: string;
  /** Settings the image was generated with (may differ from the draft) */
  settings: Settings;
  /** QR symbol version (1-40) */
  version: number;
  /** Modules per side, excluding the quiet zone */
  moduleCount: number;
  width: number;
  height: number;
  /** Increments on every successful generation, used for cache busting */
  revision: number;
  /** ISO timestamp */
  createdAt: string;
}

export interface ErrorSummary {
  kind: QrErrorKind;
  message: string;
}

export interface ControllerSnapshot {
  state: ControllerState;
  /** Draft text as last submitted by the user */
  text: string;
  /** Draft settings; can drift from image.settings until regenerated */
  settings: Settings;
  image: ImageSummary | null;
  status: StatusMessage;
  lastError: ErrorSummary | null;
}

export interface ExportSummary {
  path: string;
  format: ExportFormat;
  bytes: number;
}
