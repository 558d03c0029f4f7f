import type { ErrorSummary, QrErrorKind } from "@qr-studio/shared";

/**
 * Base class for every failure the controller recovers from.
 * `status` is the HTTP status the API answers with.
 */
export abstract class QrStudioError extends Error {
  abstract readonly kind: QrErrorKind;
  abstract readonly status: 400 | 409 | 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  toSummary(): ErrorSummary {
    return { kind: this.kind, message: this.message };
  }
}

export class EmptyInputError extends QrStudioError {
  readonly kind = "EmptyInputError";
  readonly status = 400;

  constructor() {
    super("Please enter text or URL to generate QR code");
    this.name = "EmptyInputError";
  }
}

/**
 * The QR library could not represent the text, usually because it exceeds
 * the capacity of version 40 at the chosen error-correction level.
 */
export class EncodingError extends QrStudioError {
  readonly kind = "EncodingError";
  readonly status = 400;

  constructor(cause: unknown) {
    super(`Could not encode text: ${describeCause(cause)}`, { cause });
    this.name = "EncodingError";
  }
}

export class NoImageError extends QrStudioError {
  readonly kind = "NoImageError";
  readonly status = 409;

  constructor() {
    super("Generate a QR code first before saving");
    this.name = "NoImageError";
  }
}

export class WriteError extends QrStudioError {
  readonly kind = "WriteError";
  readonly status = 500;
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not save file: ${describeCause(cause)}`, { cause });
    this.name = "WriteError";
    this.path = path;
  }
}

export function isQrStudioError(error: unknown): error is QrStudioError {
  return error instanceof QrStudioError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
