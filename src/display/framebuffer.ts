// Framebuffer implementing the display side of DSP. Pixels hold packed 0xRRGGBB colors.

export interface PixelSink {
  setPixel(x: number, y: number, packedColor: number): void;
  clear?(): void;
}

export function unpackColor(packed: number): { r: number; g: number; b: number } {
  return { r: (packed >>> 16) & 0xff, g: (packed >>> 8) & 0xff, b: packed & 0xff };
}

export class Framebuffer implements PixelSink {
  readonly pixels: Uint32Array;
  writes = 0; // pixels accepted since the last clear
  dropped = 0; // out-of-range writes ignored

  constructor(readonly width: number, readonly height: number) {
    if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
      throw new RangeError(`invalid framebuffer size ${width}x${height}`);
    }
    this.pixels = new Uint32Array(width * height);
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  // Out-of-range coordinates are dropped here, never reported back to the CPU.
  setPixel(x: number, y: number, packedColor: number): void {
    if (!this.inBounds(x, y)) {
      this.dropped++;
      return;
    }
    this.pixels[y * this.width + x] = packedColor & 0xffffff;
    this.writes++;
  }

  getPixel(x: number, y: number): number {
    if (!this.inBounds(x, y)) throw new RangeError(`pixel (${x},${y}) outside ${this.width}x${this.height}`);
    return this.pixels[y * this.width + x];
  }

  clear(): void {
    this.pixels.fill(0);
    this.writes = 0;
    this.dropped = 0;
  }

  // Opaque RGBA, each source pixel expanded to scale x scale.
  toRGBA(scale = 1): Uint8Array {
    if (!Number.isInteger(scale) || scale <= 0) throw new RangeError(`invalid pixel scale ${scale}`);
    const w = this.width * scale;
    const h = this.height * scale;
    const out = new Uint8Array(w * h * 4);
    for (let y = 0; y < h; y++) {
      const srcRow = Math.floor(y / scale) * this.width;
      for (let x = 0; x < w; x++) {
        const { r, g, b } = unpackColor(this.pixels[srcRow + Math.floor(x / scale)]);
        const o = (y * w + x) * 4;
        out[o] = r;
        out[o + 1] = g;
        out[o + 2] = b;
        out[o + 3] = 0xff;
      }
    }
    return out;
  }
}
