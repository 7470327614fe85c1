// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * The host image object that format readers populate.
 *
 * A reader asks it to open a source (path or in-memory bytes), then
 * stores the decoded header, dimensions and pixel data on it. Cached
 * statistics are only dropped through {@link ImageObject.resetValues}.
 */

import { readFile } from "node:fs/promises";

import { gunzipSync } from "fflate";

import { UnsupportedOperationError } from "./errors.js";
import type { PixelBuffer } from "./frame.js";
import { copyTagDictionary, type FrozenTagDictionary, type TagDictionary } from "./tag-table.js";

/** A file path or the file's bytes. */
export type ImageSource = string | Uint8Array | ArrayBuffer;

/** What a format reader needs from the image it fills in. */
export interface ImageObject {
  header: TagDictionary;
  /** Fast axis extent (width). */
  dim1: number;
  /** Slow axis extent (height). */
  dim2: number;
  data: PixelBuffer | undefined;
  /** Load the whole source, decompressed. */
  open(source: ImageSource): Promise<Uint8Array>;
  /** A fresh header, seeded from `header` when given. */
  checkHeader(header?: FrozenTagDictionary): TagDictionary;
  /** Drop cached statistics. */
  resetValues(): void;
}

const GZIP_MAGIC = [0x1f, 0x8b];

/** Human-readable name of a source, for log and error messages. */
export function describeSource(source: ImageSource): string {
  if (typeof source === "string") return source;
  return `<${source.byteLength} bytes in memory>`;
}

/**
 * Default {@link ImageObject}: reads paths through `fs`, accepts bytes
 * as they are, and transparently gunzips gzip-compressed input.
 */
export class FileImageObject implements ImageObject {
  header: TagDictionary = {};
  dim1 = 0;
  dim2 = 0;
  data: PixelBuffer | undefined;

  private min: number | undefined;
  private max: number | undefined;
  private mean: number | undefined;

  async open(source: ImageSource): Promise<Uint8Array> {
    let bytes: Uint8Array;
    if (typeof source === "string") {
      bytes = await readFile(source);
    } else if (source instanceof Uint8Array) {
      bytes = source;
    } else {
      bytes = new Uint8Array(source);
    }
    return isGzip(bytes) ? gunzipSync(bytes) : bytes;
  }

  checkHeader(header?: FrozenTagDictionary): TagDictionary {
    return header ? copyTagDictionary(header) : {};
  }

  resetValues(): void {
    this.min = undefined;
    this.max = undefined;
    this.mean = undefined;
  }

  getMin(): number {
    this.min ??= this.reduce((acc, value) => Math.min(acc, value), Infinity);
    return this.min;
  }

  getMax(): number {
    this.max ??= this.reduce((acc, value) => Math.max(acc, value), -Infinity);
    return this.max;
  }

  getMean(): number {
    this.mean ??= this.reduce((acc, value) => acc + value, 0) / this.pixels().length;
    return this.mean;
  }

  private pixels(): PixelBuffer["data"] {
    if (!this.data || this.data.data.length === 0) {
      throw new UnsupportedOperationError("The image holds no pixel data");
    }
    return this.data.data;
  }

  private reduce(fn: (acc: number, value: number) => number, initial: number): number {
    const pixels = this.pixels();
    let acc = initial;
    for (let i = 0; i < pixels.length; i++) {
      acc = fn(acc, pixels[i]);
    }
    return acc;
  }
}

function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
}
