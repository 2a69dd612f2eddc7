import fs from 'fs';
import { PNG } from 'pngjs';
import type { Framebuffer } from './framebuffer';

export function framebufferToPNG(fb: Framebuffer, scale = 1): PNG {
  const rgba = fb.toRGBA(scale);
  const png = new PNG({ width: fb.width * scale, height: fb.height * scale });
  // pngjs expects a Buffer; copy through a Node Buffer view
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);
  return png;
}

export function encodePNG(fb: Framebuffer, scale = 1): Buffer {
  return PNG.sync.write(framebufferToPNG(fb, scale));
}

export async function writePNG(fb: Framebuffer, outPath: string, scale = 1): Promise<void> {
  const png = framebufferToPNG(fb, scale);
  await new Promise<void>((resolve, reject) => {
    const s = fs.createWriteStream(outPath);
    png.pack().pipe(s);
    s.on('finish', () => resolve());
    s.on('error', (e) => reject(e));
  });
}
