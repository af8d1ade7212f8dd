import { BoundsError, ValidationError } from "../errors";

/**
 * Mutable 2-D pixel grid. Each pixel is a fixed-size tuple of channel
 * bytes; the grid is owned by the caller and the engine only mutates it.
 */
export interface PixelGrid {
  readonly rows: number;
  readonly cols: number;
  readonly channels: number;
  get(row: number, col: number): Uint8Array;
  set(row: number, col: number, pixel: ArrayLike<number>): void;
  /** Swap the pixels of two rows over the inclusive column range. */
  swapRowSegment(rowA: number, rowB: number, fromCol: number, toCol: number): void;
}

/**
 * Grid over an interleaved, row-major byte buffer, the layout sharp
 * produces with `.raw()`. The grid shares the caller's memory.
 */
export class RawPixelGrid implements PixelGrid {
  readonly rows: number;
  readonly cols: number;
  readonly channels: number;
  readonly data: Uint8Array;

  constructor(data: Uint8Array, width: number, height: number, channels: number) {
    if (![width, height, channels].every((n) => Number.isInteger(n) && n > 0)) {
      throw new ValidationError(`invalid grid shape ${width}x${height}x${channels}`);
    }
    if (data.length !== width * height * channels) {
      throw new ValidationError(
        `pixel buffer holds ${data.length} bytes, expected ${width * height * channels} for ${width}x${height}x${channels}`
      );
    }
    // Plain Uint8Array view: Buffer#slice would alias instead of copy.
    this.data = new Uint8Array(data.buffer, data.byteOffset, data.length);
    this.cols = width;
    this.rows = height;
    this.channels = channels;
  }

  static blank(width: number, height: number, channels: number): RawPixelGrid {
    return new RawPixelGrid(new Uint8Array(width * height * channels), width, height, channels);
  }

  get(row: number, col: number): Uint8Array {
    const offset = this.offsetOf(row, col);
    return this.data.slice(offset, offset + this.channels);
  }

  set(row: number, col: number, pixel: ArrayLike<number>): void {
    if (pixel.length !== this.channels) {
      throw new ValidationError(`pixel has ${pixel.length} channels, grid has ${this.channels}`);
    }
    this.data.set(pixel, this.offsetOf(row, col));
  }

  swapRowSegment(rowA: number, rowB: number, fromCol: number, toCol: number): void {
    if (toCol < fromCol) {
      throw new BoundsError(`column range ${fromCol}..${toCol} is inverted`);
    }
    if (rowA === rowB) return;
    const startA = this.offsetOf(rowA, fromCol);
    const startB = this.offsetOf(rowB, fromCol);
    const end = this.offsetOf(rowA, toCol) + this.channels;
    const size = end - startA;

    const tmp = this.data.slice(startA, end);
    this.data.copyWithin(startA, startB, startB + size);
    this.data.set(tmp, startB);
  }

  clone(): RawPixelGrid {
    return new RawPixelGrid(this.data.slice(), this.cols, this.rows, this.channels);
  }

  private offsetOf(row: number, col: number): number {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
      throw new BoundsError(`row ${row} is outside the grid (0..${this.rows - 1})`);
    }
    if (!Number.isInteger(col) || col < 0 || col >= this.cols) {
      throw new BoundsError(`column ${col} is outside the grid (0..${this.cols - 1})`);
    }
    return (row * this.cols + col) * this.channels;
  }
}
