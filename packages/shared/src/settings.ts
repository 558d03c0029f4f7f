import { z } from "zod";

/**
 * QR redundancy tiers, lowest to highest.
 * Higher tiers survive more damage but hold less data per symbol.
 */
export const ERROR_CORRECTION_LEVELS = [
  "LOW",
  "MEDIUM",
  "QUARTILE",
  "HIGH",
] as const;

export type ErrorCorrectionLevel = (typeof ERROR_CORRECTION_LEVELS)[number];

/** Labels shown in the error-correction picker */
export const ERROR_CORRECTION_LABELS: Record<ErrorCorrectionLevel, string> = {
  LOW: "Low (7%)",
  MEDIUM: "Medium (15%)",
  QUARTILE: "Quartile (25%)",
  HIGH: "High (30%)",
};

export const MODULE_SIZE_MIN = 5;
export const MODULE_SIZE_MAX = 20;
export const DEFAULT_MODULE_SIZE = 10;
export const DEFAULT_ERROR_CORRECTION_LEVEL: ErrorCorrectionLevel = "MEDIUM";

export const ErrorCorrectionLevelSchema = z.enum(ERROR_CORRECTION_LEVELS);

/**
 * Module size in pixels. Coerced so HTML form values ("12") validate too.
 */
export const ModuleSizeSchema = z.coerce
  .number()
  .int()
  .min(MODULE_SIZE_MIN)
  .max(MODULE_SIZE_MAX);

export const SettingsSchema = z.object({
  errorCorrectionLevel: ErrorCorrectionLevelSchema,
  moduleSize: ModuleSizeSchema,
});

export type Settings = z.infer<typeof SettingsSchema>;

export const PartialSettingsSchema = SettingsSchema.partial();

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  errorCorrectionLevel: DEFAULT_ERROR_CORRECTION_LEVEL,
  moduleSize: DEFAULT_MODULE_SIZE,
};

export function isErrorCorrectionLevel(
  value: string,
): value is ErrorCorrectionLevel {
  return (ERROR_CORRECTION_LEVELS as readonly string[]).includes(value);
}

/**
 * Clamp an arbitrary number into the module size range, rounding to an integer.
 */
export function clampModuleSize(value: number): number {
  if (!Number.isFinite(value)) return DEFAULT_MODULE_SIZE;
  return Math.min(MODULE_SIZE_MAX, Math.max(MODULE_SIZE_MIN, Math.round(value)));
}
