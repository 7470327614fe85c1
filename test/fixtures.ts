// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Test fixture helpers: small TIFF files built in memory with the
 * package's own encoder, stub decoder backends and a recording logger.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { BackendKind, DecoderBackend } from "../src/decoder.js";
import { createPixelBuffer, type PixelBuffer } from "../src/frame.js";
import { LogLevel, Logger } from "../src/logger.js";
import type { TagDictionary } from "../src/tag-table.js";
import {
  TIFF_TYPE_RATIONAL,
  TIFF_TYPE_SHORT,
  buildTiff,
  makeImageTags,
} from "../src/tiff-writer.js";
import { encodeTiff } from "../src/write.js";

/** Fixed clock: DateTime "2024:01:02 03:04:05". */
export const FIXED_NOW = (): Date => new Date(2024, 0, 2, 3, 4, 5);
export const FIXED_DATE_TIME = "2024:01:02 03:04:05";

/**
 * uint16 plane where pixel i of frame f holds `f * 100 + i`.
 */
export function createUint16Plane(width: number, height: number, frame = 0): PixelBuffer {
  const values = new Uint16Array(width * height);
  for (let i = 0; i < values.length; i++) {
    values[i] = frame * 100 + i;
  }
  return createPixelBuffer(values, [height, width]);
}

/**
 * Multi-frame uint16 TIFF (4x3 by default). Frame f carries the
 * ImageDescription "frame f".
 */
export function createFrameStack(frames = 3, width = 4, height = 3): Uint8Array {
  const images = Array.from({ length: frames }, (_, f) => ({
    data: createUint16Plane(width, height, f),
    header: { imageDescription: `frame ${f}` },
  }));
  return new Uint8Array(encodeTiff(images, { now: FIXED_NOW }));
}

/** 2x2 RGB uint8 TIFF; pixel i, channel c holds `i * 10 + c`. */
export function createRgbTiff(): Uint8Array {
  const values = new Uint8Array(2 * 2 * 3);
  for (let i = 0; i < 4; i++) {
    for (let c = 0; c < 3; c++) {
      values[i * 3 + c] = i * 10 + c;
    }
  }
  const data = createPixelBuffer(values, [2, 2, 3]);
  return new Uint8Array(encodeTiff([{ data }], { now: FIXED_NOW }));
}

/**
 * Single 4x3 uint16 image with XResolution 72/1, YResolution 145/2 and
 * ResolutionUnit 2 (inch).
 */
export function createResolutionTiff(): Uint8Array {
  const plane = createUint16Plane(4, 3);
  const tags = [
    ...makeImageTags(4, 3, 1, 16, 1),
    { tag: 282, type: TIFF_TYPE_RATIONAL, values: [72, 1] },
    { tag: 283, type: TIFF_TYPE_RATIONAL, values: [145, 2] },
    { tag: 296, type: TIFF_TYPE_SHORT, values: [2] },
  ];
  const strip = new Uint8Array(plane.data.buffer, plane.data.byteOffset, plane.data.byteLength);
  return new Uint8Array(buildTiff([{ tags, strip }]));
}

// ── Stub decoders ───────────────────────────────────────────────────

export interface StubFrame {
  header: TagDictionary;
  data: PixelBuffer;
}

export interface StubDecoderOptions {
  codec?: string;
  frames?: StubFrame[];
  /** Thrown from open(). */
  openError?: Error;
}

/** A {@link DecoderBackend} serving canned frames and counting calls. */
export class StubDecoder implements DecoderBackend {
  readonly codec: string;
  openCalls = 0;
  closeCalls = 0;
  opened: ArrayBuffer | undefined;

  private readonly frames: StubFrame[];

  constructor(
    readonly kind: BackendKind,
    private readonly options: StubDecoderOptions = {},
  ) {
    this.codec = options.codec ?? `stub-${kind}`;
    this.frames = options.frames ?? [];
  }

  async open(source: ArrayBuffer): Promise<number> {
    this.openCalls++;
    this.opened = source;
    if (this.options.openError) throw this.options.openError;
    return this.frames.length;
  }

  async getHeader(index: number): Promise<TagDictionary> {
    return { ...this.frame(index).header };
  }

  async getData(index: number): Promise<PixelBuffer> {
    return this.frame(index).data;
  }

  close(): void {
    this.closeCalls++;
  }

  private frame(index: number): StubFrame {
    const frame = this.frames[index];
    if (!frame) throw new RangeError(`no stub frame ${index}`);
    return frame;
  }
}

/** A canned 3x2 uint8 frame. */
export function stubFrame(header: TagDictionary = { imageWidth: 3, imageLength: 2 }): StubFrame {
  return {
    header,
    data: createPixelBuffer(new Uint8Array([1, 2, 3, 4, 5, 6]), [2, 3]),
  };
}

// ── Logging ─────────────────────────────────────────────────────────

export interface LogEntry {
  level: LogLevel;
  prefix: string;
  message: string;
  args: unknown[];
}

/** Logger that keeps every entry at or above `level`. */
export function recordingLogger(level: LogLevel = LogLevel.DEBUG): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = new Logger("test", {
    level,
    sink: (entryLevel, prefix, message, ...args) => {
      entries.push({ level: entryLevel, prefix: String(prefix), message: String(message), args });
    },
  });
  return { logger, entries };
}

/** Messages logged at exactly `level`. */
export function messagesAt(entries: LogEntry[], level: LogLevel): string[] {
  return entries.filter((entry) => entry.level === level).map((entry) => entry.message);
}

// ── Temporary files ─────────────────────────────────────────────────

/** Run `fn` with a fresh directory under the OS temp dir, removed afterwards. */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), "detector-tiff-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
