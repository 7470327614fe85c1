// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Error taxonomy for probing, decoding and writing detector TIFFs.
 *
 * Only {@link DecodeFailure} (and its subclass {@link CodecUnavailableError})
 * is recoverable: the orchestrator turns it into a move to the next
 * backend. Everything else reaches the caller.
 */

import type { BackendKind } from "./decoder.js";

/** Base class for all errors raised by this package. */
export class TiffImageError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TiffImageError";
  }
}

/** The byte prefix is too short or malformed for the header probe. */
export class FormatError extends TiffImageError {
  constructor(detail: string) {
    super(detail, "FORMAT_ERROR");
    this.name = "FormatError";
  }
}

/** A single backend could not parse the file. */
export class DecodeFailure extends TiffImageError {
  constructor(
    public readonly backend: BackendKind,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`[${backend}] ${detail}`, "DECODE_FAILURE", options);
    this.name = "DecodeFailure";
  }
}

/** The codec behind a backend cannot be loaded in this runtime. */
export class CodecUnavailableError extends DecodeFailure {
  constructor(backend: BackendKind, codec: string, options?: { cause?: unknown }) {
    super(backend, `codec "${codec}" is not available`, options);
    this.name = "CodecUnavailableError";
  }
}

/** Every backend in the chain failed. */
export class FatalDecodeError extends TiffImageError {
  constructor(
    source: string,
    public readonly failures: readonly DecodeFailure[],
  ) {
    super(
      `No TIFF reader managed to read ${source}`,
      "FATAL_DECODE_ERROR",
      { cause: failures[failures.length - 1] },
    );
    this.name = "FatalDecodeError";
  }
}

/** The active backend (or lack of one) does not provide the operation. */
export class UnsupportedOperationError extends TiffImageError {
  constructor(detail: string) {
    super(detail, "UNSUPPORTED_OPERATION");
    this.name = "UnsupportedOperationError";
  }
}

/** The source holds no bytes at all. */
export class EmptySourceError extends TiffImageError {
  constructor(source: string) {
    super(`${source} is empty`, "EMPTY_SOURCE");
    this.name = "EmptySourceError";
  }
}

/** Render any thrown value as a message. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
