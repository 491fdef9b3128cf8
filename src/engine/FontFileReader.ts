/**
 * Synchronous font file reading. Blocks the calling frame; no path
 * validation or normalization.
 */

import { readFileSync } from "node:fs";
import { fontDataFromBytes } from "../lib/fontDefinitions";
import type { FontData } from "../types/fontConfig.types";

export type FontFileReader = (path: string) => FontData;

/**
 * The file at `path` could not be read. Message is the underlying I/O error's.
 */
export class FontReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "FontReadError";
    this.path = path;
  }
}

function isIoError(error: unknown): boolean {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

export const readFontFile: FontFileReader = (path) => {
  let buffer: Buffer;
  try {
    buffer = readFileSync(path);
  } catch (error) {
    if (isIoError(error)) {
      throw new FontReadError(path, error);
    }
    throw error;
  }
  // Small reads are views into Node's shared pool; copy into an owned buffer.
  return fontDataFromBytes(new Uint8Array(buffer));
};
