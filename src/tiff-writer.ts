// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Low-level TIFF binary builder.
 *
 * Assembles IFD entries, tag values and strip data into a classic
 * little-endian TIFF (magic 42, 32-bit offsets). Each image is written
 * as a single strip, optionally deflate-compressed.
 *
 * Layout strategy (two-pass):
 *   Pass 1: Compress strips, resolve tags, compute sizes and offsets.
 *   Pass 2: Write into a pre-allocated ArrayBuffer.
 *
 * File layout:
 *   [Header 8 bytes]
 *   [IFD 0 entries + overflow data + strip data]
 *   [IFD 1 entries + overflow data + strip data]
 *   ...
 *
 * IFD 0 starts at byte 8 and tags are sorted by number, so a file whose
 * first three tags are ImageWidth, ImageLength and BitsPerSample has
 * their inline values at 16-bit words 9, 15 and 21 (see header-probe).
 */

import { zlibSync } from "fflate";

// ── TIFF constants ──────────────────────────────────────────────────

/** TIFF tag data types. */
export const TIFF_TYPE_BYTE = 1;
export const TIFF_TYPE_ASCII = 2;
export const TIFF_TYPE_SHORT = 3;
export const TIFF_TYPE_LONG = 4;
export const TIFF_TYPE_RATIONAL = 5;

const TYPE_SIZES: Record<number, number> = {
  [TIFF_TYPE_BYTE]: 1,
  [TIFF_TYPE_ASCII]: 1,
  [TIFF_TYPE_SHORT]: 2,
  [TIFF_TYPE_LONG]: 4,
  [TIFF_TYPE_RATIONAL]: 8,
};

/** Tags the builder fills in or that makeImageTags emits. */
export const TAG_IMAGE_WIDTH = 256;
export const TAG_IMAGE_LENGTH = 257;
export const TAG_BITS_PER_SAMPLE = 258;
export const TAG_COMPRESSION = 259;
export const TAG_PHOTOMETRIC = 262;
export const TAG_STRIP_OFFSETS = 273;
export const TAG_SAMPLES_PER_PIXEL = 277;
export const TAG_ROWS_PER_STRIP = 278;
export const TAG_STRIP_BYTE_COUNTS = 279;
export const TAG_PLANAR_CONFIGURATION = 284;
export const TAG_SAMPLE_FORMAT = 339;

/** TIFF compression codes. */
export const COMPRESSION_NONE = 1;
export const COMPRESSION_DEFLATE = 8;

/** PhotometricInterpretation values. */
export const PHOTOMETRIC_MIN_IS_BLACK = 1;
export const PHOTOMETRIC_RGB = 2;

const HEADER_SIZE = 8;
const ENTRY_SIZE = 12;
const INLINE_THRESHOLD = 4;

// ── Public types ────────────────────────────────────────────────────

/** A single TIFF tag entry. */
export interface TiffTag {
  /** TIFF tag number (e.g. 256 for ImageWidth). */
  tag: number;
  /** TIFF data type (e.g. TIFF_TYPE_SHORT = 3). */
  type: number;
  /** Tag values. For ASCII tags, pass a string. */
  values: number[] | string;
}

/** Describes one IFD (image) to be written. */
export interface WritableIfd {
  /** Tags, excluding StripOffsets / StripByteCounts which are generated. */
  tags: TiffTag[];
  /** Raw pixel bytes of the whole plane (row-major, little-endian). */
  strip: Uint8Array;
}

export type Compression = "none" | "deflate";

/** Options for buildTiff. */
export interface BuildTiffOptions {
  /** Compression applied to strip data. Default: "none". */
  compression?: Compression;
  /** Deflate compression level (1-9). Default: 6. */
  compressionLevel?: number;
}

// ── Internal types ──────────────────────────────────────────────────

interface ResolvedTag {
  tag: number;
  type: number;
  count: number;
  valueBytes: Uint8Array;
}

interface PlacedIfd {
  ifdOffset: number;
  tags: ResolvedTag[];
  overflowOffset: number;
  stripOffset: number;
  strip: Uint8Array;
  nextIfdOffset: number;
}

// ── Public API ──────────────────────────────────────────────────────

/**
 * Build a complete TIFF file from a chain of IFDs.
 *
 * @returns A complete TIFF file as an ArrayBuffer.
 */
export function buildTiff(
  ifds: WritableIfd[],
  options: BuildTiffOptions = {},
): ArrayBuffer {
  if (ifds.length === 0) {
    throw new Error("A TIFF file needs at least one image");
  }
  const compression = options.compression ?? "none";
  const level = options.compressionLevel ?? 6;

  const processed = ifds.map((ifd) => compressIfd(ifd, compression, level));
  const placed = placeIfds(processed);

  const last = placed[placed.length - 1];
  const totalSize = last.stripOffset + last.strip.length;
  const buffer = new ArrayBuffer(totalSize);
  const view = new DataView(buffer);

  // Byte order "II" (little-endian), magic 42, offset of IFD 0
  view.setUint16(0, 0x4949, true);
  view.setUint16(2, 42, true);
  view.setUint32(4, placed[0].ifdOffset, true);

  for (const p of placed) {
    writeIfd(view, buffer, p);
  }
  return buffer;
}

/**
 * Compress bytes with deflate (zlib-wrapped, RFC 1950), which is what
 * TIFF compression code 8 expects.
 */
export function compressDeflate(
  data: Uint8Array,
  level: number = 6,
): Uint8Array {
  return zlibSync(data, { level: clampLevel(level) });
}

/**
 * Standard tags for a single-strip image plane.
 *
 * @param width - Image width in pixels.
 * @param height - Image height in pixels.
 * @param samplesPerPixel - 1 for grayscale, 3 or more for color.
 * @param bitsPerSample - Bits per sample (8, 16, 32, 64).
 * @param sampleFormat - TIFF SampleFormat (1=uint, 2=int, 3=float).
 */
export function makeImageTags(
  width: number,
  height: number,
  samplesPerPixel: number,
  bitsPerSample: number,
  sampleFormat: number,
): TiffTag[] {
  const perSample = (value: number) =>
    Array.from({ length: samplesPerPixel }, () => value);

  return [
    { tag: TAG_IMAGE_WIDTH, type: TIFF_TYPE_LONG, values: [width] },
    { tag: TAG_IMAGE_LENGTH, type: TIFF_TYPE_LONG, values: [height] },
    { tag: TAG_BITS_PER_SAMPLE, type: TIFF_TYPE_SHORT, values: perSample(bitsPerSample) },
    { tag: TAG_COMPRESSION, type: TIFF_TYPE_SHORT, values: [COMPRESSION_NONE] },
    {
      tag: TAG_PHOTOMETRIC,
      type: TIFF_TYPE_SHORT,
      values: [samplesPerPixel >= 3 ? PHOTOMETRIC_RGB : PHOTOMETRIC_MIN_IS_BLACK],
    },
    { tag: TAG_SAMPLES_PER_PIXEL, type: TIFF_TYPE_SHORT, values: [samplesPerPixel] },
    { tag: TAG_ROWS_PER_STRIP, type: TIFF_TYPE_LONG, values: [height] },
    { tag: TAG_PLANAR_CONFIGURATION, type: TIFF_TYPE_SHORT, values: [1] }, // chunky
    { tag: TAG_SAMPLE_FORMAT, type: TIFF_TYPE_SHORT, values: perSample(sampleFormat) },
  ];
}

// ── Internal helpers ────────────────────────────────────────────────

function clampLevel(level: number): 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 {
  switch (Math.round(Math.min(9, Math.max(0, level)))) {
    case 0: return 0;
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    case 5: return 5;
    case 7: return 7;
    case 8: return 8;
    case 9: return 9;
    default: return 6;
  }
}

/** Compress the strip if requested and set the Compression tag to match. */
function compressIfd(
  ifd: WritableIfd,
  compression: Compression,
  level: number,
): WritableIfd {
  if (compression === "none") return ifd;

  const tags = ifd.tags.filter((t) => t.tag !== TAG_COMPRESSION);
  tags.push({ tag: TAG_COMPRESSION, type: TIFF_TYPE_SHORT, values: [COMPRESSION_DEFLATE] });
  return { tags, strip: compressDeflate(ifd.strip, level) };
}

/** Resolve a TiffTag to its byte representation. */
function resolveTag(tag: TiffTag): ResolvedTag {
  if (typeof tag.values === "string") {
    // ASCII: null-terminated
    const strBytes = new TextEncoder().encode(tag.values);
    const valueBytes = new Uint8Array(strBytes.length + 1);
    valueBytes.set(strBytes);
    return { tag: tag.tag, type: TIFF_TYPE_ASCII, count: valueBytes.length, valueBytes };
  }

  const typeSize = TYPE_SIZES[tag.type];
  if (!typeSize) {
    throw new Error(`Unknown TIFF type: ${tag.type}`);
  }

  // Rationals are passed as flat numerator, denominator pairs
  const count = tag.type === TIFF_TYPE_RATIONAL ? tag.values.length / 2 : tag.values.length;
  const valueBytes = new Uint8Array(count * typeSize);
  const dv = new DataView(valueBytes.buffer);

  tag.values.forEach((value, i) => {
    switch (tag.type) {
      case TIFF_TYPE_BYTE:
        dv.setUint8(i, value);
        break;
      case TIFF_TYPE_SHORT:
        dv.setUint16(i * 2, value, true);
        break;
      case TIFF_TYPE_LONG:
      case TIFF_TYPE_RATIONAL:
        dv.setUint32(i * 4, value, true);
        break;
    }
  });

  return { tag: tag.tag, type: tag.type, count, valueBytes };
}

function longTag(tag: number, value: number): ResolvedTag {
  const valueBytes = new Uint8Array(4);
  new DataView(valueBytes.buffer).setUint32(0, value, true);
  return { tag, type: TIFF_TYPE_LONG, count: 1, valueBytes };
}

/** Size of the overflow area: values that don't fit in 4 bytes, word aligned. */
function overflowSize(tags: ResolvedTag[]): number {
  let size = 0;
  for (const t of tags) {
    if (t.valueBytes.length > INLINE_THRESHOLD) {
      size += t.valueBytes.length + (t.valueBytes.length % 2);
    }
  }
  return size;
}

/** Place all IFDs sequentially and link the chain. */
function placeIfds(ifds: WritableIfd[]): PlacedIfd[] {
  const placed: PlacedIfd[] = [];
  let cursor = HEADER_SIZE;

  for (const ifd of ifds) {
    const tags = ifd.tags
      .filter((t) => t.tag !== TAG_STRIP_OFFSETS && t.tag !== TAG_STRIP_BYTE_COUNTS)
      .map(resolveTag);
    // StripOffsets is patched once the strip position is known
    tags.push(longTag(TAG_STRIP_OFFSETS, 0));
    tags.push(longTag(TAG_STRIP_BYTE_COUNTS, ifd.strip.length));
    tags.sort((a, b) => a.tag - b.tag);

    const ifdOffset = cursor;
    cursor += 2 + tags.length * ENTRY_SIZE + 4;
    const overflowOffset = cursor;
    cursor += overflowSize(tags);
    const stripOffset = cursor;
    cursor += ifd.strip.length;
    // Keep every IFD on a word boundary
    cursor += cursor % 2;

    placed.push({
      ifdOffset,
      tags,
      overflowOffset,
      stripOffset,
      strip: ifd.strip,
      nextIfdOffset: 0,
    });
  }

  for (let i = 0; i < placed.length - 1; i++) {
    placed[i].nextIfdOffset = placed[i + 1].ifdOffset;
  }
  return placed;
}

/** Write a single placed IFD into the buffer. */
function writeIfd(view: DataView, buffer: ArrayBuffer, placed: PlacedIfd): void {
  let pos = placed.ifdOffset;
  view.setUint16(pos, placed.tags.length, true);
  pos += 2;

  let overflowCursor = placed.overflowOffset;

  for (const tag of placed.tags) {
    view.setUint16(pos, tag.tag, true);
    view.setUint16(pos + 2, tag.type, true);
    view.setUint32(pos + 4, tag.count, true);

    const valueBytes =
      tag.tag === TAG_STRIP_OFFSETS ? longTag(tag.tag, placed.stripOffset).valueBytes : tag.valueBytes;

    if (valueBytes.length <= INLINE_THRESHOLD) {
      new Uint8Array(buffer, pos + 8, INLINE_THRESHOLD).set(valueBytes);
    } else {
      view.setUint32(pos + 8, overflowCursor, true);
      new Uint8Array(buffer, overflowCursor, valueBytes.length).set(valueBytes);
      overflowCursor += valueBytes.length + (valueBytes.length % 2);
    }
    pos += ENTRY_SIZE;
  }

  view.setUint32(pos, placed.nextIfdOffset, true);
  new Uint8Array(buffer, placed.stripOffset, placed.strip.length).set(placed.strip);
}
