// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * TiffImage: a detector image read from a TIFF-family file.
 *
 * Reading walks a two-step decoder chain: the multi-frame primary codec
 * first, then the single-frame fallback codec when the primary reports a
 * {@link DecodeFailure}. Whichever succeeds becomes the active backend
 * and supplies frame 0; only the primary backend serves further frames.
 *
 * @example
 * ```ts
 * import { TiffImage } from "detector-tiff";
 *
 * const image = await TiffImage.open("scan_0001.tif");
 * console.log(image.dim1, image.dim2, image.frameCount, image.backend);
 * const second = await image.getFrame(1);
 * image.close();
 * ```
 */

import type { BackendKind, DecoderBackend, DecoderFactory } from "./decoder.js";
import {
  CodecUnavailableError,
  DecodeFailure,
  EmptySourceError,
  FatalDecodeError,
  FormatError,
  UnsupportedOperationError,
} from "./errors.js";
import { FallbackDecoder } from "./fallback-decoder.js";
import { createFrame, planeDimensions, type Frame, type PixelBuffer } from "./frame.js";
import { probeHeader, type HeaderHint } from "./header-probe.js";
import {
  FileImageObject,
  describeSource,
  type ImageObject,
  type ImageSource,
} from "./image-object.js";
import { Logger } from "./logger.js";
import { PrimaryDecoder } from "./primary-decoder.js";
import { DEFAULT_TAG_TABLE, type TagDictionary, type TagTable } from "./tag-table.js";
import { toArrayBuffer } from "./utils.js";
import { writeTiff, type WriteOptions } from "./write.js";

/** Where a container is in its decode lifecycle. */
export type DecodeState =
  | "init"
  | "probing"
  | "primary-attempt"
  | "fallback-attempt"
  | "ready"
  | "error"
  | "closed";

/** The backend serving frames, or "none" before/without a decode. */
export type ActiveBackend = BackendKind | "none";

/** Options for {@link TiffImage}. */
export interface TiffImageOptions {
  /** Logger for decode progress and backend failures. */
  logger?: Logger;
  /** Tag id → name table handed to the default decoders. */
  tagTable?: TagTable;
  /** Creates the primary backend. Default: geotiff. */
  primary?: DecoderFactory;
  /** Creates the fallback backend. Default: UTIF. */
  fallback?: DecoderFactory;
  /** Host object receiving header, dims and data. Default: a {@link FileImageObject}. */
  imageObject?: ImageObject;
}

const CHAIN: readonly BackendKind[] = ["primary", "fallback"];

export class TiffImage {
  /** The host object holding header, dims and data. */
  readonly image: ImageObject;

  private readonly logger: Logger;
  private readonly factories: Record<BackendKind, DecoderFactory>;

  private _state: DecodeState = "init";
  private _backend: ActiveBackend = "none";
  private adapter: DecoderBackend | undefined;
  private _frameCount = 0;
  private _hint: HeaderHint | undefined;
  private current: Frame | undefined;

  constructor(options: TiffImageOptions = {}) {
    const tagTable = options.tagTable ?? DEFAULT_TAG_TABLE;
    this.logger = options.logger?.child("tiff-image") ?? new Logger("tiff-image");
    this.factories = {
      primary: options.primary ?? (() => new PrimaryDecoder(tagTable)),
      fallback: options.fallback ?? (() => new FallbackDecoder({ tagTable })),
    };
    this.image = options.imageObject ?? new FileImageObject();
  }

  /** Construct a container and read `source` into it. */
  static async open(source: ImageSource, options: TiffImageOptions = {}): Promise<TiffImage> {
    return new TiffImage(options).read(source);
  }

  get state(): DecodeState {
    return this._state;
  }

  get backend(): ActiveBackend {
    return this._backend;
  }

  /** Frames available: N for the primary backend, 1 for the fallback. */
  get frameCount(): number {
    return this._frameCount;
  }

  /** Values read by the header probe, if it succeeded. */
  get hint(): HeaderHint | undefined {
    return this._hint;
  }

  /** Bit depth reported by the header probe. */
  get bitDepth(): number | undefined {
    return this._hint?.bitDepth;
  }

  /** Frame 0 of the last successful read. */
  get currentFrame(): Frame | undefined {
    return this.current;
  }

  get header(): TagDictionary {
    return this.image.header;
  }

  get data(): PixelBuffer | undefined {
    return this.image.data;
  }

  get dim1(): number {
    return this.image.dim1;
  }

  get dim2(): number {
    return this.image.dim2;
  }

  /**
   * Decode `source`, leaving frame 0 on the image object.
   *
   * @throws EmptySourceError when the source holds no bytes.
   * @throws FatalDecodeError when every backend failed; the container
   *   then stays in state "error" with no dims or data.
   */
  async read(source: ImageSource): Promise<this> {
    if (this._state !== "init") this.close();
    const name = describeSource(source);

    this._state = "probing";
    this.resetImage();

    let bytes: Uint8Array;
    try {
      bytes = await this.image.open(source);
    } catch (error) {
      this._state = "error";
      throw error;
    }
    if (bytes.byteLength === 0) {
      this._state = "error";
      this.logger.error(`Cannot read ${name}: the source is empty`);
      throw new EmptySourceError(name);
    }

    this.probe(bytes, name);

    // Every backend gets the whole file from offset 0
    const buffer = toArrayBuffer(bytes);
    const failures: DecodeFailure[] = [];

    for (const kind of CHAIN) {
      this._state = kind === "primary" ? "primary-attempt" : "fallback-attempt";
      const adapter = this.factories[kind]();
      try {
        const { count, frame } = await this.attempt(adapter, buffer);
        this.activate(adapter, kind === "fallback" ? 1 : count, frame);
        this.logger.debug(
          `Read ${name} with ${adapter.codec} (${this._frameCount} frame(s))`,
        );
        return this;
      } catch (error) {
        adapter.close();
        if (!(error instanceof DecodeFailure)) {
          this._state = "error";
          throw error;
        }
        failures.push(error);
        this.reportFailure(adapter, name, error);
      }
    }

    // The probe hint stays; dims and data do not
    this._state = "error";
    this.image.data = undefined;
    this.image.dim1 = 0;
    this.image.dim2 = 0;
    this.logger.error(`Error in opening ${name}: no TIFF reader managed to read the file`);
    throw new FatalDecodeError(name, failures);
  }

  /**
   * Decode frame `index` from the primary backend. The frame is not
   * cached on the container.
   *
   * @throws UnsupportedOperationError unless the primary backend is active.
   * @throws RangeError unless `0 <= index < frameCount`.
   */
  async getFrame(index: number): Promise<Frame> {
    if (this._backend !== "primary" || !this.adapter) {
      throw new UnsupportedOperationError(
        "getFrame is only available when the primary decoder read the file",
      );
    }
    if (!Number.isInteger(index) || index < 0 || index >= this._frameCount) {
      throw new RangeError(`Frame ${index} out of range (${this._frameCount} available)`);
    }
    const header = await this.adapter.getHeader(index);
    const data = await this.adapter.getData(index);
    return createFrame(header, data);
  }

  /** Write the current frame and its header as a TIFF file. */
  async write(path: string, options: WriteOptions = {}): Promise<void> {
    const data = this.image.data;
    if (!data) {
      throw new UnsupportedOperationError("There is no pixel data to write");
    }
    await writeTiff(path, data, this.image.header, options);
  }

  /** Release the active backend. Safe to call in any state, repeatedly. */
  close(): void {
    const adapter = this.adapter;
    this.adapter = undefined;
    adapter?.close();
    this._backend = "none";
    this._state = "closed";
  }

  // ---------- internal helpers ----------

  private async attempt(
    adapter: DecoderBackend,
    buffer: ArrayBuffer,
  ): Promise<{ count: number; frame: Frame }> {
    const count = await adapter.open(buffer);
    if (count < 1) {
      throw new DecodeFailure(adapter.kind, "the file holds no frames");
    }
    const header = await adapter.getHeader(0);
    const data = await adapter.getData(0);
    return { count, frame: createFrame(header, data) };
  }

  private activate(adapter: DecoderBackend, frameCount: number, frame: Frame): void {
    this.adapter = adapter;
    this._backend = adapter.kind;
    this._frameCount = frameCount;
    this.current = frame;

    this.image.header = this.image.checkHeader(frame.header);
    this.image.data = frame.data;
    this.updateDimensions(frame.data);
    this.image.resetValues();
    this._state = "ready";
  }

  private probe(bytes: Uint8Array, name: string): void {
    try {
      this._hint = probeHeader(bytes);
    } catch (error) {
      if (!(error instanceof FormatError)) throw error;
      this.logger.debug(`Skipping header probe of ${name}: ${error.message}`);
      return;
    }
    this.image.dim1 = this._hint.width;
    this.image.dim2 = this._hint.height;
  }

  private updateDimensions(data: PixelBuffer): void {
    const plane = planeDimensions(data);
    if (!plane) {
      this.logger.warn(
        `Dataset has ${data.shape.length} dimensions ([${data.shape.join(", ")}]), check for errors`,
      );
      return;
    }
    this.image.dim1 = plane.width;
    this.image.dim2 = plane.height;
    if (data.shape.length === 3) {
      this.logger.warn("Third dimension is the color");
    }
  }

  private reportFailure(adapter: DecoderBackend, name: string, error: DecodeFailure): void {
    if (error instanceof CodecUnavailableError) {
      this.logger.error(
        `Cannot try ${adapter.codec} on ${name}: the codec is not available in this environment`,
        error,
      );
    } else if (adapter.kind === "primary") {
      this.logger.warn(
        `Unable to read ${name} with ${adapter.codec} due to ${error.message}, trying the fallback reader`,
        error,
      );
    } else {
      this.logger.error(`Error in opening ${name} with ${adapter.codec}`, error);
    }
  }

  private resetImage(): void {
    this._backend = "none";
    this._frameCount = 0;
    this._hint = undefined;
    this.current = undefined;
    this.image.header = this.image.checkHeader();
    this.image.data = undefined;
    this.image.dim1 = 0;
    this.image.dim2 = 0;
    this.image.resetValues();
  }
}
