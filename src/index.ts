// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * detector-tiff
 *
 * Read and write TIFF-family detector images: multi-frame decoding via
 * geotiff with a single-frame UTIF fallback, one normalized header model
 * for both, and a plain TIFF writer.
 *
 * @example
 * ```ts
 * import { TiffImage } from "detector-tiff";
 *
 * const image = await TiffImage.open("scan_0001.tif");
 * console.log(image.header.imageDescription, image.dim1, image.dim2);
 * await image.write("copy.tif");
 * image.close();
 * ```
 */

export {
  TiffImage,
  type TiffImageOptions,
  type DecodeState,
  type ActiveBackend,
} from "./tiff-image.js";
export { SpreadsheetImage } from "./spreadsheet-image.js";
export {
  FileImageObject,
  describeSource,
  type ImageObject,
  type ImageSource,
} from "./image-object.js";

// Decoder backends
export type { DecoderBackend, DecoderFactory, BackendKind } from "./decoder.js";
export { PrimaryDecoder } from "./primary-decoder.js";
export {
  FallbackDecoder,
  type FallbackDecoderOptions,
  type FallbackHandle,
  type CodecLoader,
} from "./fallback-decoder.js";
export { probeHeader, PROBE_LENGTH, type HeaderHint, type ByteOrderMark } from "./header-probe.js";

// Data model
export {
  createPixelBuffer,
  createFrame,
  planeDimensions,
  type PixelBuffer,
  type Frame,
} from "./frame.js";
export {
  DEFAULT_TAG_TABLE,
  RATIONAL_TAGS,
  publicTagName,
  invertTagTable,
  normalizeTagValue,
  rationalQuotients,
  numericTag,
  freezeTagDictionary,
  copyTagDictionary,
  type TagTable,
  type TagValue,
  type TagDictionary,
  type FrozenTagValue,
  type FrozenTagDictionary,
} from "./tag-table.js";
export {
  tiffDtypeToPixel,
  pixelToTiffDtype,
  bytesPerElement,
  type PixelDataType,
  type PixelArray,
  type TiffDtypeInfo,
} from "./dtypes.js";

// Writer
export {
  writeTiff,
  encodeTiff,
  TiffWriteSession,
  DEFAULT_SOFTWARE,
  type WriteOptions,
  type WritableImage,
} from "./write.js";
export {
  buildTiff,
  makeImageTags,
  compressDeflate,
  type WritableIfd,
  type TiffTag,
  type BuildTiffOptions,
  type Compression,
} from "./tiff-writer.js";

// Errors and logging
export {
  TiffImageError,
  FormatError,
  DecodeFailure,
  CodecUnavailableError,
  FatalDecodeError,
  UnsupportedOperationError,
  EmptySourceError,
} from "./errors.js";
export { Logger, LogLevel, consoleSink, type LogSink, type LoggerOptions } from "./logger.js";
