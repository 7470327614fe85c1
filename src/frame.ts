// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Pixel buffers and frames: one exposure's header + pixel data pair.
 */

import { pixelDataTypeOf, type PixelArray, type PixelDataType } from "./dtypes.js";
import { freezeTagDictionary, type FrozenTagDictionary } from "./tag-table.js";

/**
 * Row-major numeric array. Shape is `[height, width]` or
 * `[height, width, channels]`; codecs may in principle hand back other
 * ranks, which the orchestrator reports but does not reject.
 */
export interface PixelBuffer {
  readonly data: PixelArray;
  readonly shape: readonly number[];
  readonly dtype: PixelDataType;
}

/** One exposure. Read-only once produced. */
export interface Frame {
  readonly header: FrozenTagDictionary;
  readonly data: PixelBuffer;
}

/**
 * Wrap a typed array and its shape as a {@link PixelBuffer}.
 *
 * @throws If the shape does not account for every element.
 */
export function createPixelBuffer(
  data: PixelArray,
  shape: readonly number[],
): PixelBuffer {
  const dtype = pixelDataTypeOf(data);
  if (dtype === undefined) {
    throw new TypeError("Pixel data must be a numeric typed array");
  }
  const expected = shape.reduce((product, extent) => product * extent, 1);
  if (expected !== data.length) {
    throw new RangeError(
      `Shape [${shape.join(", ")}] needs ${expected} elements, got ${data.length}`,
    );
  }
  return { data, shape: [...shape], dtype };
}

/** Pair a header with its pixel data. The header, arrays included, is copied and frozen. */
export function createFrame(header: FrozenTagDictionary, data: PixelBuffer): Frame {
  return { header: freezeTagDictionary(header), data };
}

/** Width and height of a rank-2 or rank-3 buffer, or undefined. */
export function planeDimensions(
  buffer: PixelBuffer,
): { width: number; height: number } | undefined {
  if (buffer.shape.length !== 2 && buffer.shape.length !== 3) return undefined;
  return { height: buffer.shape[0], width: buffer.shape[1] };
}
