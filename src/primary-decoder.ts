// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Primary backend: geotiff, a full TIFF parser with multi-frame
 * (multi-IFD) support and a complete field dictionary per image.
 */

import { fromArrayBuffer } from "geotiff";
import type { GeoTIFFImage } from "geotiff";

import type { DecoderBackend } from "./decoder.js";
import { isPixelArray } from "./dtypes.js";
import { DecodeFailure, UnsupportedOperationError, describeError } from "./errors.js";
import { createPixelBuffer, type PixelBuffer } from "./frame.js";
import {
  DEFAULT_TAG_TABLE,
  RATIONAL_TAGS,
  invertTagTable,
  normalizeTagValue,
  publicTagName,
  rationalQuotients,
  type TagDictionary,
  type TagTable,
} from "./tag-table.js";

type GeoTIFF = Awaited<ReturnType<typeof fromArrayBuffer>>;

export class PrimaryDecoder implements DecoderBackend {
  readonly kind = "primary";
  readonly codec = "geotiff";

  private tiff: GeoTIFF | undefined;
  private frameCount = 0;
  private readonly idsByName: Map<string, number>;

  constructor(private readonly tagTable: TagTable = DEFAULT_TAG_TABLE) {
    this.idsByName = invertTagTable(tagTable);
  }

  async open(source: ArrayBuffer): Promise<number> {
    this.close();
    try {
      const tiff = await fromArrayBuffer(source);
      const count = await tiff.getImageCount();
      this.tiff = tiff;
      this.frameCount = count;
      return count;
    } catch (cause) {
      throw new DecodeFailure(
        this.kind,
        `geotiff could not parse the file structure: ${describeError(cause)}`,
        { cause },
      );
    }
  }

  async getHeader(index: number): Promise<TagDictionary> {
    const image = await this.image(index);
    return this.translate(Object.entries(image.getFileDirectory()));
  }

  async getData(index: number): Promise<PixelBuffer> {
    const image = await this.image(index);
    const width = image.getWidth();
    const height = image.getHeight();
    const samples = image.getSamplesPerPixel();

    let raster: unknown;
    try {
      // interleave=true gives one flat, pixel-interleaved TypedArray
      raster = await image.readRasters({ interleave: true });
    } catch (cause) {
      throw new DecodeFailure(
        this.kind,
        `geotiff could not decode frame ${index}: ${describeError(cause)}`,
        { cause },
      );
    }
    if (!isPixelArray(raster)) {
      throw new DecodeFailure(this.kind, `frame ${index} has no numeric raster`);
    }

    const shape = samples > 1 ? [height, width, samples] : [height, width];
    return createPixelBuffer(raster, shape);
  }

  close(): void {
    this.tiff = undefined;
    this.frameCount = 0;
  }

  // ---------- internal helpers ----------

  private async image(index: number): Promise<GeoTIFFImage> {
    if (!this.tiff) {
      throw new UnsupportedOperationError("The primary decoder is not open");
    }
    if (!Number.isInteger(index) || index < 0 || index >= this.frameCount) {
      throw new RangeError(
        `Frame ${index} out of range (${this.frameCount} available)`,
      );
    }
    try {
      return await this.tiff.getImage(index);
    } catch (cause) {
      throw new DecodeFailure(
        this.kind,
        `geotiff could not read image directory ${index}: ${describeError(cause)}`,
        { cause },
      );
    }
  }

  /**
   * geotiff keys its directories by canonical field name; only names
   * that the tag table knows are kept. Rationals arrive as
   * numerator/denominator pairs.
   */
  private translate(entries: [string, unknown][]): TagDictionary {
    const header: TagDictionary = {};
    for (const [name, raw] of entries) {
      const id = this.idsByName.get(name);
      if (id === undefined) continue;
      const value = normalizeTagValue(raw);
      if (value === undefined) continue;
      header[publicTagName(this.tagTable.get(id) ?? name)] = RATIONAL_TAGS.has(id)
        ? rationalQuotients(value)
        : value;
    }
    return header;
  }
}
