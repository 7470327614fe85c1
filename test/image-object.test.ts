// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { gzipSync } from "fflate";
import { describe, it, expect } from "vitest";

import { UnsupportedOperationError } from "../src/errors.js";
import { createPixelBuffer } from "../src/frame.js";
import { FileImageObject, describeSource } from "../src/image-object.js";
import { withTempDir } from "./fixtures.js";

describe("FileImageObject.open", () => {
  it("returns in-memory bytes unchanged", async () => {
    const image = new FileImageObject();
    const bytes = new Uint8Array([1, 2, 3]);
    expect(await image.open(bytes)).toBe(bytes);
    const buffer = new ArrayBuffer(2);
    new Uint8Array(buffer).set([4, 5]);
    expect(Array.from(await image.open(buffer))).toEqual([4, 5]);
  });

  it("reads files from disk", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "raw.bin");
      await writeFile(path, new Uint8Array([7, 8, 9]));
      expect(Array.from(await new FileImageObject().open(path))).toEqual([7, 8, 9]);
    });
  });

  it("gunzips compressed input", async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, "raw.bin.gz");
      await writeFile(path, gzipSync(new Uint8Array([10, 20, 30])));
      const image = new FileImageObject();
      expect(Array.from(await image.open(path))).toEqual([10, 20, 30]);
      expect(Array.from(await image.open(gzipSync(new Uint8Array([40]))))).toEqual([40]);
    });
  });
});

describe("FileImageObject statistics", () => {
  it("computes min, max and mean", () => {
    const image = new FileImageObject();
    image.data = createPixelBuffer(new Float32Array([1, -2, 3, 6]), [2, 2]);
    expect(image.getMin()).toBe(-2);
    expect(image.getMax()).toBe(6);
    expect(image.getMean()).toBe(2);
  });

  it("caches values until resetValues", () => {
    const image = new FileImageObject();
    image.data = createPixelBuffer(new Uint8Array([2, 4]), [1, 2]);
    expect(image.getMean()).toBe(3);

    image.data = createPixelBuffer(new Uint8Array([10, 20]), [1, 2]);
    expect(image.getMean()).toBe(3);
    expect(image.getMax()).toBe(20);

    image.resetValues();
    expect(image.getMean()).toBe(15);
  });

  it("refuses statistics without pixel data", () => {
    expect(() => new FileImageObject().getMin()).toThrow(UnsupportedOperationError);
  });
});

describe("FileImageObject.checkHeader", () => {
  it("returns a fresh copy", () => {
    const image = new FileImageObject();
    const seed = { title: "x" };
    const header = image.checkHeader(seed);
    expect(header).toEqual(seed);
    expect(header).not.toBe(seed);
    expect(image.checkHeader()).toEqual({});
  });

  it("copies array values", () => {
    const bitsPerSample = [8, 8, 8];
    const header = new FileImageObject().checkHeader({ bitsPerSample });
    bitsPerSample[0] = 16;
    expect(header.bitsPerSample).toEqual([8, 8, 8]);
  });
});

describe("describeSource", () => {
  it("names paths and in-memory buffers", () => {
    expect(describeSource("/data/a.tif")).toBe("/data/a.tif");
    expect(describeSource(new Uint8Array(12))).toBe("<12 bytes in memory>");
  });
});
