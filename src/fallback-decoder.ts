// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Fallback backend: UTIF, a small general-purpose raster decoder.
 *
 * UTIF exposes raw per-image tag maps keyed "t<id>" and decodes strips
 * without understanding the file as a frame sequence, so this backend
 * only ever yields the first image. The codec is imported lazily; when
 * it cannot be loaded the backend reports {@link CodecUnavailableError}.
 */

import type { DecoderBackend } from "./decoder.js";
import {
  bytesPerElement,
  getTypedArrayConstructor,
  tiffDtypeToPixel,
  type PixelDataType,
} from "./dtypes.js";
import {
  CodecUnavailableError,
  DecodeFailure,
  UnsupportedOperationError,
  describeError,
} from "./errors.js";
import { createPixelBuffer, type PixelBuffer } from "./frame.js";
import {
  DEFAULT_TAG_TABLE,
  TAG_BITS_PER_SAMPLE,
  TAG_IMAGE_LENGTH,
  TAG_IMAGE_WIDTH,
  TAG_SAMPLE_FORMAT,
  TAG_SAMPLES_PER_PIXEL,
  normalizeTagValue,
  numericTag,
  publicTagName,
  type TagDictionary,
  type TagTable,
} from "./tag-table.js";
import { isRecord } from "./utils.js";

/** The part of the UTIF API this backend relies on. */
interface RasterCodec {
  decode(buffer: ArrayBuffer): unknown;
  decodeImage(buffer: ArrayBuffer, ifd: Record<string, unknown>): void;
}

/** Resolves the codec module (or its namespace wrapper). */
export type CodecLoader = () => Promise<unknown>;

export interface FallbackDecoderOptions {
  /** Tag id → name table. Default: {@link DEFAULT_TAG_TABLE}. */
  tagTable?: TagTable;
  /** Loads the codec. Default: `import("utif")`. */
  loadCodec?: CodecLoader;
}

/** An opened image: the first directory and the bytes it points into. */
export interface FallbackHandle {
  readonly codec: RasterCodec;
  readonly source: ArrayBuffer;
  readonly ifd: Record<string, unknown>;
}

const CODEC_NAME = "utif";

const loadUtif: CodecLoader = () => import("utif");

export class FallbackDecoder implements DecoderBackend {
  readonly kind = "fallback";
  readonly codec = CODEC_NAME;

  private handle: FallbackHandle | undefined;
  private readonly tagTable: TagTable;
  private readonly loadCodec: CodecLoader;

  constructor(options: FallbackDecoderOptions = {}) {
    this.tagTable = options.tagTable ?? DEFAULT_TAG_TABLE;
    this.loadCodec = options.loadCodec ?? loadUtif;
  }

  async open(source: ArrayBuffer): Promise<number> {
    this.close();
    this.handle = await this.openHandle(source);
    return 1;
  }

  async getHeader(index: number): Promise<TagDictionary> {
    return this.extractHeader(this.requireFrame(index));
  }

  async getData(index: number): Promise<PixelBuffer> {
    return this.extractData(this.requireFrame(index));
  }

  close(): void {
    this.handle = undefined;
  }

  /**
   * Interpret the bytes as a raster image.
   *
   * @throws CodecUnavailableError when UTIF cannot be loaded.
   * @throws DecodeFailure when no image directory can be read.
   */
  async openHandle(source: ArrayBuffer): Promise<FallbackHandle> {
    const codec = await this.resolveCodec();

    let ifds: unknown;
    try {
      ifds = codec.decode(source);
    } catch (cause) {
      throw new DecodeFailure(
        this.kind,
        `not a recognized raster format: ${describeError(cause)}`,
        { cause },
      );
    }

    const first: unknown = Array.isArray(ifds) ? ifds[0] : undefined;
    if (!isRecord(first) || first[tagKey(TAG_IMAGE_WIDTH)] === undefined) {
      throw new DecodeFailure(this.kind, "no image directory found");
    }
    return { codec, source, ifd: first };
  }

  /** Translate the native "t<id>" tag map through the tag table. */
  extractHeader(handle: FallbackHandle): TagDictionary {
    const header: TagDictionary = {};
    for (const [id, name] of this.tagTable) {
      const raw = handle.ifd[tagKey(id)];
      if (raw === undefined) continue;
      const value = normalizeTagValue(raw);
      if (value === undefined) continue;
      header[publicTagName(name)] = value;
    }
    return header;
  }

  /** Decode the first image into a pixel buffer. */
  extractData(handle: FallbackHandle): PixelBuffer {
    const { ifd } = handle;
    try {
      handle.codec.decodeImage(handle.source, ifd);
    } catch (cause) {
      throw new DecodeFailure(
        this.kind,
        `could not decode pixel data: ${describeError(cause)}`,
        { cause },
      );
    }

    const width = tagNumber(ifd, TAG_IMAGE_WIDTH, 0);
    const height = tagNumber(ifd, TAG_IMAGE_LENGTH, 0);
    const samples = tagNumber(ifd, TAG_SAMPLES_PER_PIXEL, 1);
    const bits = tagNumber(ifd, TAG_BITS_PER_SAMPLE, 1);
    const sampleFormat = tagNumber(ifd, TAG_SAMPLE_FORMAT, 1);

    let dtype: PixelDataType;
    try {
      dtype = tiffDtypeToPixel(sampleFormat, bits);
    } catch (cause) {
      throw new DecodeFailure(this.kind, describeError(cause), { cause });
    }

    const raw = ifd.data;
    const byteLength = width * height * samples * bytesPerElement(dtype);
    if (!(raw instanceof Uint8Array) || raw.byteLength < byteLength) {
      throw new DecodeFailure(
        this.kind,
        `decoded raster is smaller than ${width}x${height}x${samples} ${dtype}`,
      );
    }

    // Copy into an aligned buffer of exactly the image size
    const aligned = new ArrayBuffer(byteLength);
    new Uint8Array(aligned).set(raw.subarray(0, byteLength));
    const Ctor = getTypedArrayConstructor(dtype);
    const shape = samples > 1 ? [height, width, samples] : [height, width];
    return createPixelBuffer(new Ctor(aligned), shape);
  }

  // ---------- internal helpers ----------

  private requireFrame(index: number): FallbackHandle {
    if (index !== 0) {
      throw new UnsupportedOperationError(
        `The ${CODEC_NAME} backend only provides frame 0 (requested ${index})`,
      );
    }
    if (!this.handle) {
      throw new UnsupportedOperationError("The fallback decoder is not open");
    }
    return this.handle;
  }

  private async resolveCodec(): Promise<RasterCodec> {
    let loaded: unknown;
    try {
      loaded = await this.loadCodec();
    } catch (cause) {
      throw new CodecUnavailableError(this.kind, CODEC_NAME, { cause });
    }
    // ESM import of a CommonJS module puts the exports under `default`
    const candidate = isRecord(loaded) && "default" in loaded ? loaded.default : loaded;
    if (isRasterCodec(candidate)) return candidate;
    if (isRasterCodec(loaded)) return loaded;
    throw new CodecUnavailableError(this.kind, CODEC_NAME);
  }
}

function isRasterCodec(value: unknown): value is RasterCodec {
  return (
    isRecord(value) &&
    typeof value.decode === "function" &&
    typeof value.decodeImage === "function"
  );
}

function tagKey(id: number): string {
  return `t${id}`;
}

function tagNumber(
  ifd: Record<string, unknown>,
  id: number,
  fallback: number,
): number {
  return numericTag(normalizeTagValue(ifd[tagKey(id)]), fallback);
}
