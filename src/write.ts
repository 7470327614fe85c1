// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * High-level TIFF writer.
 *
 * Encodes pixel buffers plus their descriptive header tags through the
 * package's own TIFF builder and writes the result inside a scoped write
 * session: the file handle is released on every exit path, including a
 * failure halfway through encoding or writing. Errors reach the caller
 * unchanged; there is no fallback writer and no retry.
 *
 * @example
 * ```ts
 * import { writeTiff, createPixelBuffer } from "detector-tiff";
 *
 * const data = createPixelBuffer(new Uint16Array(512 * 512), [512, 512]);
 * await writeTiff("frame.tif", data, { imageDescription: "dark current" });
 * ```
 */

import { open, type FileHandle } from "node:fs/promises";

import { pixelToTiffDtype } from "./dtypes.js";
import type { PixelBuffer } from "./frame.js";
import {
  DEFAULT_TAG_TABLE,
  TAG_DATE_TIME,
  TAG_SOFTWARE,
  publicTagName,
  type TagDictionary,
  type TagTable,
} from "./tag-table.js";
import {
  TIFF_TYPE_ASCII,
  buildTiff,
  makeImageTags,
  type Compression,
  type TiffTag,
  type WritableIfd,
} from "./tiff-writer.js";
import { formatTiffDateTime, viewBytes } from "./utils.js";

/** Software tag written when none is configured. */
export const DEFAULT_SOFTWARE = "detector-tiff";

/**
 * Free-text tags copied from the header into the file. Structural tags
 * are always derived from the pixel buffer instead.
 */
const DESCRIPTIVE_TAGS = [269, 270, 271, 272, 285, 315, 316, 33432];

/** Options for the writer. */
export interface WriteOptions {
  /** Compression for pixel data. Default: "none". */
  compression?: Compression;
  /** Deflate compression level (1-9). Default: 6. */
  compressionLevel?: number;
  /** Software identifier tag. Default: "detector-tiff". */
  software?: string;
  /** Clock for the DateTime tag. Default: the current time. */
  now?: () => Date;
  /** Tag id → name table used to find header keys. */
  tagTable?: TagTable;
}

/** One image to encode. */
export interface WritableImage {
  data: PixelBuffer;
  header?: TagDictionary;
}

/**
 * Encode images as a classic TIFF, one IFD per image.
 */
export function encodeTiff(
  images: readonly WritableImage[],
  options: WriteOptions = {},
): ArrayBuffer {
  const software = options.software ?? DEFAULT_SOFTWARE;
  const timestamp = formatTiffDateTime((options.now ?? (() => new Date()))());
  const tagTable = options.tagTable ?? DEFAULT_TAG_TABLE;

  const ifds: WritableIfd[] = images.map(({ data, header = {} }) => {
    const { width, height, samples } = planeLayout(data);
    const { bitsPerSample, sampleFormat } = pixelToTiffDtype(data.dtype);

    const tags: TiffTag[] = [
      ...makeImageTags(width, height, samples, bitsPerSample, sampleFormat),
      ...descriptiveTags(header, tagTable),
      { tag: TAG_SOFTWARE, type: TIFF_TYPE_ASCII, values: software },
      { tag: TAG_DATE_TIME, type: TIFF_TYPE_ASCII, values: timestamp },
    ];
    // Typed arrays are host-endian; every supported Node platform is
    // little-endian, matching the "II" header
    return { tags, strip: viewBytes(data.data) };
  });

  return buildTiff(ifds, {
    compression: options.compression,
    compressionLevel: options.compressionLevel,
  });
}

/**
 * A write session against one output path. Create with
 * {@link TiffWriteSession.open}; always {@link TiffWriteSession.close}.
 */
export class TiffWriteSession {
  private handle: FileHandle | undefined;

  private constructor(
    handle: FileHandle,
    private readonly options: WriteOptions,
  ) {
    this.handle = handle;
  }

  /** Open (create or truncate) the target file. */
  static async open(path: string, options: WriteOptions = {}): Promise<TiffWriteSession> {
    return new TiffWriteSession(await open(path, "w"), options);
  }

  /** Encode and write the whole file. */
  async write(images: readonly WritableImage[]): Promise<void> {
    if (!this.handle) {
      throw new Error("The write session is closed");
    }
    const bytes = new Uint8Array(encodeTiff(images, this.options));
    await this.handle.writeFile(bytes);
  }

  /** Release the file handle. Safe to call more than once. */
  async close(): Promise<void> {
    const handle = this.handle;
    this.handle = undefined;
    await handle?.close();
  }
}

/**
 * Write one pixel buffer and its header to `path`.
 *
 * The software identifier and a generation timestamp are always added.
 */
export async function writeTiff(
  path: string,
  data: PixelBuffer,
  header: TagDictionary = {},
  options: WriteOptions = {},
): Promise<void> {
  const session = await TiffWriteSession.open(path, options);
  try {
    await session.write([{ data, header }]);
  } finally {
    await session.close();
  }
}

// ── Internal helpers ────────────────────────────────────────────────

function planeLayout(data: PixelBuffer): {
  width: number;
  height: number;
  samples: number;
} {
  const [height, width, samples = 1] = data.shape;
  if (data.shape.length !== 2 && data.shape.length !== 3) {
    throw new RangeError(
      `Only rank-2 and rank-3 buffers can be written (got rank ${data.shape.length})`,
    );
  }
  return { width, height, samples };
}

function descriptiveTags(header: TagDictionary, tagTable: TagTable): TiffTag[] {
  const tags: TiffTag[] = [];
  for (const id of DESCRIPTIVE_TAGS) {
    const name = tagTable.get(id);
    if (name === undefined) continue;
    const value = header[publicTagName(name)];
    if (typeof value === "string" && value.length > 0) {
      tags.push({ tag: id, type: TIFF_TYPE_ASCII, values: value });
    }
  }
  return tags;
}
