// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

import { describe, it, expect } from "vitest";

import { FormatError } from "../src/errors.js";
import { PROBE_LENGTH, probeHeader } from "../src/header-probe.js";

/** 64-byte prefix with the given little-endian words set. */
function prefix(words: Record<number, number>, mark = "II"): Uint8Array {
  const bytes = new Uint8Array(PROBE_LENGTH);
  const view = new DataView(bytes.buffer);
  for (const [index, value] of Object.entries(words)) {
    view.setUint16(Number(index) * 2, value, true);
  }
  bytes.set(new TextEncoder().encode(mark), 0);
  return bytes;
}

describe("probeHeader", () => {
  it("reads width, height and bit depth from words 9, 15 and 21", () => {
    expect(probeHeader(prefix({ 9: 2048, 15: 1024, 21: 32 }))).toEqual({
      width: 2048,
      height: 1024,
      bitDepth: 32,
      byteOrder: "II",
    });
  });

  it("reads words little-endian whatever the byte-order mark", () => {
    const hint = probeHeader(prefix({ 9: 0x0100 }, "MM"));
    expect(hint.byteOrder).toBe("MM");
    expect(hint.width).toBe(256);
  });

  it("reports an unknown byte-order mark", () => {
    expect(probeHeader(prefix({}, "PK")).byteOrder).toBe("unknown");
  });

  it("honors the byte offset of a view", () => {
    const backing = new Uint8Array(PROBE_LENGTH + 10);
    backing.set(prefix({ 9: 7, 15: 5, 21: 8 }), 10);
    expect(probeHeader(backing.subarray(10))).toMatchObject({ width: 7, height: 5, bitDepth: 8 });
  });

  it("ignores bytes past the probe window", () => {
    const long = new Uint8Array(200).fill(0xff);
    long.set(prefix({ 9: 1, 15: 2, 21: 16 }));
    expect(probeHeader(long)).toMatchObject({ width: 1, height: 2, bitDepth: 16 });
  });

  it("throws FormatError for prefixes shorter than 64 bytes", () => {
    expect(() => probeHeader(new Uint8Array(63))).toThrow(FormatError);
    expect(() => probeHeader(new Uint8Array(0))).toThrow("Header probe needs 64 bytes, got 0");
  });

  it("does not modify the source", () => {
    const bytes = prefix({ 9: 3 });
    const copy = bytes.slice();
    probeHeader(bytes);
    expect(bytes).toEqual(copy);
  });
});
