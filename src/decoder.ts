// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Strategy interface implemented by both decoder backends.
 *
 * The orchestrator walks an ordered chain of these (primary first,
 * fallback second) and keeps the first one that opens the file.
 */

import type { PixelBuffer } from "./frame.js";
import type { TagDictionary } from "./tag-table.js";

/** Position of a backend in the decode chain. */
export type BackendKind = "primary" | "fallback";

export interface DecoderBackend {
  readonly kind: BackendKind;
  /** Name of the wrapped codec, for log messages. */
  readonly codec: string;
  /**
   * Parse the file structure.
   *
   * @param source - The whole file, read from offset 0.
   * @returns The number of frames available.
   * @throws DecodeFailure when the codec cannot parse the file.
   */
  open(source: ArrayBuffer): Promise<number>;
  /** Normalized header of one frame. */
  getHeader(index: number): Promise<TagDictionary>;
  /** Decoded pixels of one frame. */
  getData(index: number): Promise<PixelBuffer>;
  /** Release codec handles. Safe to call more than once. */
  close(): void;
}

/** Creates a fresh, unopened backend for each decode attempt. */
export type DecoderFactory = () => DecoderBackend;
