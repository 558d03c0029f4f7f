import {
  clampModuleSize,
  DEFAULT_ERROR_CORRECTION_LEVEL,
  DEFAULT_MODULE_SIZE,
  type ErrorCorrectionLevel,
  isErrorCorrectionLevel,
} from "@qr-studio/shared";
import {
  BLACK,
  DEFAULT_BORDER,
  DEFAULT_JPEG_QUALITY,
  parseHexColor,
  type Rgb,
  WHITE,
} from "./qr/raster.js";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_PORT = 3410;
export const DEFAULT_PREVIEW_SIZE = 250;
const MIN_PREVIEW_SIZE = 50;

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
  /** UI server port */
  port: number;
  /** Host/interface to bind to (default: 127.0.0.1) */
  host: string;
  /** Whether to open the UI in the default browser on startup */
  openBrowser: boolean;
  /** Base directory for relative export paths */
  exportDir: string;
  /** Quiet zone around the symbol, in modules */
  border: number;
  /** Side length of the preview image in pixels */
  previewSize: number;
  foreground: Rgb;
  background: Rgb;
  /** JPEG encoder quality, 1-100 */
  jpegQuality: number;
  /** Module size the draft starts with */
  defaultModuleSize: number;
  /** Error-correction level the draft starts with */
  defaultErrorCorrectionLevel: ErrorCorrectionLevel;
  /** Minimum log level. Default: info */
  logLevel: LogLevel;
  /** Whether to pretty-print console logs. Default: true */
  logPretty: boolean;
}

/**
 * Load configuration from environment variables with defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const errorCorrection = env.QR_DEFAULT_ERROR_CORRECTION?.trim().toUpperCase();

  return {
    port: parseIntOrDefault(env.PORT, DEFAULT_PORT),
    // 127.0.0.1 rather than "localhost" avoids IPv6 ambiguity
    host: env.HOST ?? "127.0.0.1",
    openBrowser: parseBooleanOrDefault(env.OPEN_BROWSER, true),
    exportDir: env.QR_EXPORT_DIR ?? process.cwd(),
    border: parseIntOrDefault(env.QR_BORDER, DEFAULT_BORDER, { min: 0 }),
    previewSize: parseIntOrDefault(env.QR_PREVIEW_SIZE, DEFAULT_PREVIEW_SIZE, {
      min: MIN_PREVIEW_SIZE,
    }),
    foreground: parseColorOrDefault(env.QR_FOREGROUND, BLACK),
    background: parseColorOrDefault(env.QR_BACKGROUND, WHITE),
    jpegQuality: parseIntOrDefault(env.QR_JPEG_QUALITY, DEFAULT_JPEG_QUALITY, {
      min: 1,
      max: 100,
    }),
    defaultModuleSize: clampModuleSize(
      parseIntOrDefault(env.QR_DEFAULT_MODULE_SIZE, DEFAULT_MODULE_SIZE),
    ),
    defaultErrorCorrectionLevel:
      errorCorrection && isErrorCorrectionLevel(errorCorrection)
        ? errorCorrection
        : DEFAULT_ERROR_CORRECTION_LEVEL,
    logLevel: parseLogLevel(
      env.LOG_LEVEL,
      env.NODE_ENV === "test" ? "silent" : "info",
    ),
    logPretty: parseBooleanOrDefault(env.LOG_PRETTY, true),
  };
}

export interface IntRange {
  min?: number;
  max?: number;
}

/**
 * Parse a base-10 integer, falling back to the default when the value is
 * missing or not a number. The result is clamped into `range`.
 */
export function parseIntOrDefault(
  value: string | undefined,
  defaultValue: number,
  range: IntRange = {},
): number {
  const parsed = value ? Number.parseInt(value, 10) : Number.NaN;
  const result = Number.isNaN(parsed) ? defaultValue : parsed;
  const { min = Number.NEGATIVE_INFINITY, max = Number.POSITIVE_INFINITY } =
    range;
  return Math.min(max, Math.max(min, result));
}

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

/**
 * Parse a switch such as OPEN_BROWSER. Unrecognised values keep the default.
 */
export function parseBooleanOrDefault(
  value: string | undefined,
  defaultValue: boolean,
): boolean {
  const normalized = value?.trim().toLowerCase() ?? "";
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return defaultValue;
}

/**
 * Parse log level from string or return default.
 */
export function parseLogLevel(
  value: string | undefined,
  defaultValue: LogLevel,
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return defaultValue;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function parseColorOrDefault(value: string | undefined, fallback: Rgb): Rgb {
  return (value ? parseHexColor(value) : null) ?? fallback;
}
