// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, it, expect } from "vitest";

import { createFrame, createPixelBuffer, planeDimensions } from "../src/frame.js";

describe("createFrame", () => {
  it("copies the header, arrays included, and freezes it", () => {
    const stripOffsets = [8, 40];
    const header = { imageWidth: 2, stripOffsets };
    const frame = createFrame(header, createPixelBuffer(new Uint8Array(4), [2, 2]));

    stripOffsets[0] = 0;
    header.imageWidth = 5;

    expect(frame.header).toEqual({ imageWidth: 2, stripOffsets: [8, 40] });
    expect(Object.isFrozen(frame.header)).toBe(true);
    expect(Object.isFrozen(frame.header.stripOffsets)).toBe(true);
  });
});

describe("createPixelBuffer", () => {
  it("rejects shapes that do not match the element count", () => {
    expect(() => createPixelBuffer(new Uint16Array(6), [2, 2])).toThrow(
      "Shape [2, 2] needs 4 elements, got 6",
    );
  });
});

describe("planeDimensions", () => {
  it("reads height and width from rank-2 and rank-3 shapes", () => {
    expect(planeDimensions(createPixelBuffer(new Uint8Array(6), [2, 3]))).toEqual({
      height: 2,
      width: 3,
    });
    expect(planeDimensions(createPixelBuffer(new Uint8Array(12), [2, 2, 3]))).toEqual({
      height: 2,
      width: 2,
    });
    expect(planeDimensions(createPixelBuffer(new Uint8Array(4), [4]))).toBeUndefined();
  });
});
