// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Tag id → name table and the normalization shared by both decoders.
 *
 * The table is plain data passed in through options, so the decoders
 * can be exercised against synthetic tag sets. Names are the canonical
 * TIFF 6.0 field names, which is also how geotiff keys its directories.
 */

import { isPixelArray } from "./dtypes.js";

/** Mapping from numeric TIFF tag id to canonical field name. */
export type TagTable = ReadonlyMap<number, string>;

/** A normalized header value. */
export type TagValue = number | string | number[] | string[];

/** Header of one frame, keyed by public (lower camel case) tag name. */
export type TagDictionary = Record<string, TagValue>;

/** A header value that can no longer be changed in place. */
export type FrozenTagValue = number | string | readonly number[] | readonly string[];

/** Read-only header, as carried by a decoded frame. */
export type FrozenTagDictionary = Readonly<Record<string, FrozenTagValue>>;

export const TAG_IMAGE_WIDTH = 256;
export const TAG_IMAGE_LENGTH = 257;
export const TAG_BITS_PER_SAMPLE = 258;
export const TAG_SAMPLES_PER_PIXEL = 277;
export const TAG_SOFTWARE = 305;
export const TAG_DATE_TIME = 306;
export const TAG_SAMPLE_FORMAT = 339;

export const DEFAULT_TAG_TABLE: TagTable = new Map<number, string>([
  [254, "NewSubfileType"],
  [255, "SubfileType"],
  [256, "ImageWidth"],
  [257, "ImageLength"],
  [258, "BitsPerSample"],
  [259, "Compression"],
  [262, "PhotometricInterpretation"],
  [266, "FillOrder"],
  [269, "DocumentName"],
  [270, "ImageDescription"],
  [271, "Make"],
  [272, "Model"],
  [273, "StripOffsets"],
  [274, "Orientation"],
  [277, "SamplesPerPixel"],
  [278, "RowsPerStrip"],
  [279, "StripByteCounts"],
  [280, "MinSampleValue"],
  [281, "MaxSampleValue"],
  [282, "XResolution"],
  [283, "YResolution"],
  [284, "PlanarConfiguration"],
  [285, "PageName"],
  [296, "ResolutionUnit"],
  [305, "Software"],
  [306, "DateTime"],
  [315, "Artist"],
  [316, "HostComputer"],
  [317, "Predictor"],
  [320, "ColorMap"],
  [322, "TileWidth"],
  [323, "TileLength"],
  [324, "TileOffsets"],
  [325, "TileByteCounts"],
  [338, "ExtraSamples"],
  [339, "SampleFormat"],
  [33432, "Copyright"],
]);

/** Tags whose TIFF 6.0 field type is RATIONAL. */
export const RATIONAL_TAGS: ReadonlySet<number> = new Set([
  282, // XResolution
  283, // YResolution
  286, // XPosition
  287, // YPosition
  318, // WhitePoint
  319, // PrimaryChromaticities
  529, // YCbCrCoefficients
  532, // ReferenceBlackWhite
]);

/** Lowercase the first character of a canonical tag name. */
export function publicTagName(name: string): string {
  if (name.length === 0) return name;
  return name[0].toLowerCase() + name.slice(1);
}

/** Reverse lookup: canonical name → tag id. */
export function invertTagTable(table: TagTable): Map<string, number> {
  const inverse = new Map<string, number>();
  for (const [id, name] of table) {
    inverse.set(name, id);
  }
  return inverse;
}

/**
 * Normalize a raw codec value into a {@link TagValue}.
 *
 * Typed arrays become plain arrays, strings lose their NUL padding,
 * and single-element tuples collapse to their scalar. Returns undefined
 * for values that have no header representation (objects, empty arrays).
 */
export function normalizeTagValue(raw: unknown): TagValue | undefined {
  if (typeof raw === "number") return raw;
  if (typeof raw === "bigint") return Number(raw);
  if (typeof raw === "string") return stripNul(raw);

  let items: unknown[];
  if (Array.isArray(raw)) {
    items = raw;
  } else if (isPixelArray(raw)) {
    items = Array.from(raw);
  } else if (raw instanceof BigUint64Array || raw instanceof BigInt64Array) {
    items = Array.from(raw);
  } else {
    return undefined;
  }
  if (items.length === 0) return undefined;

  if (items.every((item) => typeof item === "string")) {
    const strings = items
      .map((item) => stripNul(String(item)))
      .filter((item) => item.length > 0);
    if (strings.length === 0) return "";
    return strings.length === 1 ? strings[0] : strings;
  }

  const numbers: number[] = [];
  for (const item of items) {
    if (typeof item === "number") numbers.push(item);
    else if (typeof item === "bigint") numbers.push(Number(item));
    else return undefined;
  }
  return numbers.length === 1 ? numbers[0] : numbers;
}

/**
 * Collapse numerator/denominator pairs into their quotients, the form
 * rational tags take in every header. Values that are not pairs pass
 * through unchanged.
 */
export function rationalQuotients(value: TagValue): TagValue {
  if (!Array.isArray(value) || value.length % 2 !== 0 || isStringList(value)) return value;
  const quotients: number[] = [];
  for (let i = 0; i < value.length; i += 2) {
    quotients.push(value[i] / value[i + 1]);
  }
  return quotients.length === 1 ? quotients[0] : quotients;
}

/** Read a numeric header value, taking the first element of a tuple. */
export function numericTag(value: FrozenTagValue | undefined, fallback: number): number {
  if (typeof value === "number") return value;
  if (value !== undefined && typeof value !== "string" && !isStringList(value) && value.length > 0) {
    return value[0];
  }
  return fallback;
}

/** Copy a header, arrays included, into a frozen dictionary. */
export function freezeTagDictionary(header: FrozenTagDictionary): FrozenTagDictionary {
  const frozen: Record<string, FrozenTagValue> = {};
  for (const [name, value] of Object.entries(header)) {
    if (typeof value === "number" || typeof value === "string") frozen[name] = value;
    else if (isStringList(value)) frozen[name] = Object.freeze([...value]);
    else frozen[name] = Object.freeze([...value]);
  }
  return Object.freeze(frozen);
}

/** Copy a header, arrays included, into a mutable dictionary. */
export function copyTagDictionary(header: FrozenTagDictionary): TagDictionary {
  const copy: TagDictionary = {};
  for (const [name, value] of Object.entries(header)) {
    if (typeof value === "number" || typeof value === "string") copy[name] = value;
    else if (isStringList(value)) copy[name] = [...value];
    else copy[name] = [...value];
  }
  return copy;
}

function isStringList(value: readonly number[] | readonly string[]): value is readonly string[] {
  return typeof value[0] === "string";
}

function stripNul(value: string): string {
  return value.replace(/\0+$/, "");
}
