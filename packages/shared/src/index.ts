export {
  ERROR_CORRECTION_LEVELS,
  ERROR_CORRECTION_LABELS,
  MODULE_SIZE_MIN,
  MODULE_SIZE_MAX,
  DEFAULT_MODULE_SIZE,
  DEFAULT_ERROR_CORRECTION_LEVEL,
  DEFAULT_SETTINGS,
  ErrorCorrectionLevelSchema,
  ModuleSizeSchema,
  SettingsSchema,
  PartialSettingsSchema,
  isErrorCorrectionLevel,
  clampModuleSize,
} from "./settings.js";
export type { ErrorCorrectionLevel, Settings } from "./settings.js";

export {
  EXPORT_FORMATS,
  EXPORT_FORMAT_EXTENSIONS,
  ExportFormatSchema,
  ExportRequestSchema,
  formatFromExtension,
  withFormatExtension,
} from "./export.js";
export type { ExportFormat, ExportRequest } from "./export.js";

export type {
  ControllerState,
  ControllerSnapshot,
  ErrorSummary,
  ExportSummary,
  ImageSummary,
  QrErrorKind,
  StatusLevel,
  StatusMessage,
} from "./controller-state.js";
