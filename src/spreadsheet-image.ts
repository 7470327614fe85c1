// SPDX-FileCopyrightText: Copyright (c) Fideus Labs LLC
// SPDX-License-Identifier: MIT

/**
 * Fit2D spreadsheet (`.spr`) reader: a plain-text image.
 *
 * The first line holds `xdim ydim` followed by free text and is kept as
 * the title. Every later line is one row of whitespace-separated
 * numbers; lines that do not parse as numbers are skipped.
 */

import { FormatError } from "./errors.js";
import { createPixelBuffer, type PixelBuffer } from "./frame.js";
import {
  FileImageObject,
  describeSource,
  type ImageObject,
  type ImageSource,
} from "./image-object.js";
import type { TagDictionary } from "./tag-table.js";

export class SpreadsheetImage {
  readonly image: ImageObject;

  constructor(imageObject: ImageObject = new FileImageObject()) {
    this.image = imageObject;
  }

  static async open(source: ImageSource, imageObject?: ImageObject): Promise<SpreadsheetImage> {
    return new SpreadsheetImage(imageObject).read(source);
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
   * Parse `source` into a float32 `[Dim_2, Dim_1]` buffer.
   *
   * @throws FormatError when the dimensions are missing or the rows do
   *   not fill them exactly.
   */
  async read(source: ImageSource): Promise<this> {
    const name = describeSource(source);
    this.image.header = this.image.checkHeader();
    this.image.resetValues();

    const text = new TextDecoder().decode(await this.image.open(source));
    const [titleLine = "", ...rows] = text.split(/\r?\n/);

    const [xdim, ydim] = titleLine.trim().split(/\s+/).map((item) => Number.parseInt(item, 10));
    if (!Number.isInteger(xdim) || !Number.isInteger(ydim) || xdim < 1 || ydim < 1) {
      throw new FormatError(`${name} is corrupt: no dimensions on the first line`);
    }
    this.image.header = this.image.checkHeader({ title: titleLine, Dim_1: xdim, Dim_2: ydim });
    this.image.dim1 = xdim;
    this.image.dim2 = ydim;

    const values: number[][] = [];
    for (const row of rows) {
      const parsed = parseRow(row);
      if (parsed) values.push(parsed);
    }
    if (values.length !== ydim || values.some((row) => row.length !== xdim)) {
      throw new FormatError(
        `${name}: expected ${ydim} rows of ${xdim} values, got ${values.length} rows`,
      );
    }

    const data = new Float32Array(xdim * ydim);
    values.forEach((row, y) => data.set(row, y * xdim));
    this.image.data = createPixelBuffer(data, [ydim, xdim]);
    this.image.resetValues();
    return this;
  }
}

function parseRow(line: string): number[] | undefined {
  const items = line.trim().split(/\s+/).filter((item) => item.length > 0);
  if (items.length === 0) return undefined;
  const numbers = items.map(Number);
  return numbers.every((value) => Number.isFinite(value)) ? numbers : undefined;
}
