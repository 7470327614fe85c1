// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, it, expect } from "vitest";
import {
  tiffDtypeToPixel,
  pixelToTiffDtype,
  pixelDataTypeOf,
  isPixelArray,
  bytesPerElement,
  getTypedArrayConstructor,
  SAMPLE_FORMAT_UINT,
  SAMPLE_FORMAT_INT,
  SAMPLE_FORMAT_FLOAT,
  type PixelDataType,
} from "../src/dtypes.js";

const ALL_TYPES: PixelDataType[] = [
  "uint8",
  "int8",
  "uint16",
  "int16",
  "uint32",
  "int32",
  "float32",
  "float64",
];

describe("tiffDtypeToPixel", () => {
  it("maps unsigned integer types", () => {
    expect(tiffDtypeToPixel(SAMPLE_FORMAT_UINT, 8)).toBe("uint8");
    expect(tiffDtypeToPixel(SAMPLE_FORMAT_UINT, 16)).toBe("uint16");
    expect(tiffDtypeToPixel(SAMPLE_FORMAT_UINT, 32)).toBe("uint32");
  });

  it("maps signed integer types", () => {
    expect(tiffDtypeToPixel(SAMPLE_FORMAT_INT, 8)).toBe("int8");
    expect(tiffDtypeToPixel(SAMPLE_FORMAT_INT, 16)).toBe("int16");
    expect(tiffDtypeToPixel(SAMPLE_FORMAT_INT, 32)).toBe("int32");
  });

  it("maps floating point types", () => {
    expect(tiffDtypeToPixel(SAMPLE_FORMAT_FLOAT, 32)).toBe("float32");
    expect(tiffDtypeToPixel(SAMPLE_FORMAT_FLOAT, 64)).toBe("float64");
  });

  it("throws for unsupported bit depths", () => {
    expect(() => tiffDtypeToPixel(SAMPLE_FORMAT_UINT, 64)).toThrow(
      "Unsupported unsigned integer bit depth: 64",
    );
    expect(() => tiffDtypeToPixel(SAMPLE_FORMAT_INT, 64)).toThrow(
      "Unsupported signed integer bit depth: 64",
    );
    expect(() => tiffDtypeToPixel(SAMPLE_FORMAT_FLOAT, 16)).toThrow(
      "Unsupported floating point bit depth: 16",
    );
  });

  it("throws for unsupported sample format", () => {
    expect(() => tiffDtypeToPixel(99, 8)).toThrow(
      "Unsupported TIFF SampleFormat: 99",
    );
  });
});

describe("pixelToTiffDtype", () => {
  it("inverts tiffDtypeToPixel", () => {
    for (const dtype of ALL_TYPES) {
      const { sampleFormat, bitsPerSample } = pixelToTiffDtype(dtype);
      expect(tiffDtypeToPixel(sampleFormat, bitsPerSample)).toBe(dtype);
    }
  });

  it("maps float64 to 64-bit IEEE samples", () => {
    expect(pixelToTiffDtype("float64")).toEqual({ bitsPerSample: 64, sampleFormat: 3 });
  });
});

describe("bytesPerElement", () => {
  it("returns correct byte sizes", () => {
    expect(bytesPerElement("uint8")).toBe(1);
    expect(bytesPerElement("int8")).toBe(1);
    expect(bytesPerElement("uint16")).toBe(2);
    expect(bytesPerElement("int16")).toBe(2);
    expect(bytesPerElement("uint32")).toBe(4);
    expect(bytesPerElement("int32")).toBe(4);
    expect(bytesPerElement("float32")).toBe(4);
    expect(bytesPerElement("float64")).toBe(8);
  });
});

describe("getTypedArrayConstructor", () => {
  it("returns correct constructors", () => {
    expect(getTypedArrayConstructor("uint8")).toBe(Uint8Array);
    expect(getTypedArrayConstructor("int8")).toBe(Int8Array);
    expect(getTypedArrayConstructor("uint16")).toBe(Uint16Array);
    expect(getTypedArrayConstructor("int16")).toBe(Int16Array);
    expect(getTypedArrayConstructor("uint32")).toBe(Uint32Array);
    expect(getTypedArrayConstructor("int32")).toBe(Int32Array);
    expect(getTypedArrayConstructor("float32")).toBe(Float32Array);
    expect(getTypedArrayConstructor("float64")).toBe(Float64Array);
  });
});

describe("pixelDataTypeOf", () => {
  it("identifies every supported typed array", () => {
    for (const dtype of ALL_TYPES) {
      const Ctor = getTypedArrayConstructor(dtype);
      expect(pixelDataTypeOf(new Ctor(new ArrayBuffer(8)))).toBe(dtype);
    }
  });

  it("rejects other values", () => {
    expect(pixelDataTypeOf([1, 2])).toBeUndefined();
    expect(pixelDataTypeOf(new BigInt64Array(1))).toBeUndefined();
    expect(isPixelArray(new Uint8ClampedArray(1))).toBe(false);
    expect(isPixelArray(new Int16Array(1))).toBe(true);
  });
});
