// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Quick, approximate header read performed before full decoding.
 *
 * The first 64 bytes are read as 32 unsigned 16-bit words. For the
 * common layout of a little-endian classic TIFF whose first IFD starts
 * right after the 8-byte header with ImageWidth, ImageLength and
 * BitsPerSample as its first three entries, words 9, 15 and 21 are the
 * inline values of those entries. Anything else yields meaningless
 * numbers, so the result is a hint only.
 */

import { FormatError } from "./errors.js";

/** Number of bytes the probe inspects. */
export const PROBE_LENGTH = 64;

const WORD_WIDTH = 9;
const WORD_HEIGHT = 15;
const WORD_BIT_DEPTH = 21;

/** Byte-order mark found at offset 0. */
export type ByteOrderMark = "II" | "MM" | "unknown";

/** Advisory dimensions read from the byte prefix. */
export interface HeaderHint {
  width: number;
  height: number;
  bitDepth: number;
  /**
   * Words are always read little-endian. When this is "MM" the file is
   * big-endian and the three values above are byte-swapped.
   */
  byteOrder: ByteOrderMark;
}

/**
 * Probe the first {@link PROBE_LENGTH} bytes of a source.
 *
 * @throws FormatError when fewer than 64 bytes are available.
 */
export function probeHeader(bytes: Uint8Array): HeaderHint {
  if (bytes.byteLength < PROBE_LENGTH) {
    throw new FormatError(
      `Header probe needs ${PROBE_LENGTH} bytes, got ${bytes.byteLength}`,
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, PROBE_LENGTH);
  const word = (index: number) => view.getUint16(index * 2, true);

  return {
    width: word(WORD_WIDTH),
    height: word(WORD_HEIGHT),
    bitDepth: word(WORD_BIT_DEPTH),
    byteOrder: readByteOrder(view),
  };
}

function readByteOrder(view: DataView): ByteOrderMark {
  const mark = view.getUint16(0, false);
  if (mark === 0x4949) return "II";
  if (mark === 0x4d4d) return "MM";
  return "unknown";
}
