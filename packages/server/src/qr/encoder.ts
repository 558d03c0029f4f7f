/**
 * Thin adapter over uqr: text + error-correction level -> module matrix.
 */

import type { ErrorCorrectionLevel } from "@qr-studio/shared";
import { encode } from "uqr";
import { EncodingError } from "./errors.js";

const ECC_LETTERS = {
  LOW: "L",
  MEDIUM: "M",
  QUARTILE: "Q",
  HIGH: "H",
} as const satisfies Record<ErrorCorrectionLevel, string>;

export interface ModuleMatrix {
  /** QR symbol version (1-40) */
  version: number;
  /** Modules per side, no quiet zone */
  size: number;
  /** modules[row][col], true = dark */
  modules: boolean[][];
}

export function encodeMatrix(
  text: string,
  level: ErrorCorrectionLevel,
): ModuleMatrix {
  try {
    // Quiet zone is painted by the renderer, so ask for a bare symbol
    const { version, data } = encode(text, {
      ecc: ECC_LETTERS[level],
      border: 0,
    });
    return { version, size: data.length, modules: data };
  } catch (error) {
    throw new EncodingError(error);
  }
}
