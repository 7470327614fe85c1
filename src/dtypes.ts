// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * TIFF sample format and bit depth to pixel data type mapping.
 *
 * TIFF SampleFormat values:
 *   1 = unsigned integer
 *   2 = signed integer (two's complement)
 *   3 = IEEE floating point
 */

/** Numeric element types a decoded pixel buffer can hold. */
export type PixelDataType =
  | "int8"
  | "int16"
  | "int32"
  | "uint8"
  | "uint16"
  | "uint32"
  | "float32"
  | "float64";

/** Typed arrays backing a pixel buffer. */
export type PixelArray =
  | Uint8Array
  | Int8Array
  | Uint16Array
  | Int16Array
  | Uint32Array
  | Int32Array
  | Float32Array
  | Float64Array;

/** TIFF SampleFormat tag values. */
export const SAMPLE_FORMAT_UINT = 1;
export const SAMPLE_FORMAT_INT = 2;
export const SAMPLE_FORMAT_FLOAT = 3;

/** BitsPerSample + SampleFormat pair for the TIFF encoder. */
export interface TiffDtypeInfo {
  bitsPerSample: number;
  sampleFormat: number;
}

/**
 * Map TIFF SampleFormat + BitsPerSample to a pixel data type.
 *
 * @param sampleFormat - TIFF SampleFormat tag value (1=uint, 2=int, 3=float).
 * @param bitsPerSample - Bits per sample (8, 16, 32, 64).
 * @throws If the combination is unsupported.
 */
export function tiffDtypeToPixel(
  sampleFormat: number,
  bitsPerSample: number,
): PixelDataType {
  if (sampleFormat === SAMPLE_FORMAT_UINT) {
    switch (bitsPerSample) {
      case 8:
        return "uint8";
      case 16:
        return "uint16";
      case 32:
        return "uint32";
      default:
        throw new Error(
          `Unsupported unsigned integer bit depth: ${bitsPerSample}`,
        );
    }
  } else if (sampleFormat === SAMPLE_FORMAT_INT) {
    switch (bitsPerSample) {
      case 8:
        return "int8";
      case 16:
        return "int16";
      case 32:
        return "int32";
      default:
        throw new Error(
          `Unsupported signed integer bit depth: ${bitsPerSample}`,
        );
    }
  } else if (sampleFormat === SAMPLE_FORMAT_FLOAT) {
    switch (bitsPerSample) {
      case 32:
        return "float32";
      case 64:
        return "float64";
      default:
        throw new Error(
          `Unsupported floating point bit depth: ${bitsPerSample}`,
        );
    }
  }

  throw new Error(`Unsupported TIFF SampleFormat: ${sampleFormat}`);
}

/** Inverse of {@link tiffDtypeToPixel}. */
export function pixelToTiffDtype(dtype: PixelDataType): TiffDtypeInfo {
  const bitsPerSample = bytesPerElement(dtype) * 8;
  if (dtype.startsWith("float")) {
    return { bitsPerSample, sampleFormat: SAMPLE_FORMAT_FLOAT };
  }
  if (dtype.startsWith("uint")) {
    return { bitsPerSample, sampleFormat: SAMPLE_FORMAT_UINT };
  }
  return { bitsPerSample, sampleFormat: SAMPLE_FORMAT_INT };
}

/** Number of bytes per element for a given data type. */
export function bytesPerElement(dtype: PixelDataType): number {
  const map: Record<PixelDataType, number> = {
    int8: 1,
    uint8: 1,
    int16: 2,
    uint16: 2,
    int32: 4,
    uint32: 4,
    float32: 4,
    float64: 8,
  };
  return map[dtype];
}

/**
 * Get the appropriate TypedArray constructor for a data type.
 */
export function getTypedArrayConstructor(
  dtype: PixelDataType,
): {
  new (buffer: ArrayBuffer, byteOffset?: number, length?: number): PixelArray;
} {
  switch (dtype) {
    case "uint8":
      return Uint8Array;
    case "int8":
      return Int8Array;
    case "uint16":
      return Uint16Array;
    case "int16":
      return Int16Array;
    case "uint32":
      return Uint32Array;
    case "int32":
      return Int32Array;
    case "float32":
      return Float32Array;
    case "float64":
      return Float64Array;
  }
}

/**
 * Identify the data type of a typed array returned by a codec.
 * Returns undefined for anything that is not a supported pixel array.
 */
export function pixelDataTypeOf(value: unknown): PixelDataType | undefined {
  if (value instanceof Uint8Array) return "uint8";
  if (value instanceof Int8Array) return "int8";
  if (value instanceof Uint16Array) return "uint16";
  if (value instanceof Int16Array) return "int16";
  if (value instanceof Uint32Array) return "uint32";
  if (value instanceof Int32Array) return "int32";
  if (value instanceof Float32Array) return "float32";
  if (value instanceof Float64Array) return "float64";
  return undefined;
}

/** Narrow an unknown codec result to a pixel array. */
export function isPixelArray(value: unknown): value is PixelArray {
  return pixelDataTypeOf(value) !== undefined;
}
