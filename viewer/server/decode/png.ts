/**
 * PNG codec on pngjs. Samples are 8-bit after pngjs rescales 16-bit input.
 */

import { PNG, type ColorType } from "pngjs";
import type { ChannelCount, RasterData } from "../../js/core/image";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function isPng(bytes: Uint8Array): boolean {
  return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((b, i) => bytes[i] === b);
}

/**
 * Decode a PNG. Gray stays single channel, color and palette images become
 * RGB, and any alpha makes the result RGBA.
 */
export function decodePng(bytes: Uint8Array): RasterData {
  const png = PNG.sync.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  const { width, height, data } = png;
  const isColor = png.color || png.palette;
  const channelCount: ChannelCount = png.alpha ? 4 : isColor ? 3 : 1;

  const pixels = width * height;
  const samples = new Uint8Array(pixels * channelCount);
  for (let i = 0; i < pixels; i++) {
    const src = i * 4;
    const dst = i * channelCount;
    if (channelCount === 1) {
      samples[dst] = data[src];
    } else {
      // pngjs expands gray to RGBA, so gray+alpha lands here as equal RGB
      for (let c = 0; c < channelCount; c++) samples[dst + c] = data[src + c];
    }
  }
  return { width, height, channelCount, samples, maxValue: 255 };
}

const COLOR_TYPES: Record<ChannelCount, ColorType> = { 1: 0, 3: 2, 4: 6 };

/** Encode a raster as an 8-bit PNG, rescaling from the raster's maxValue. */
export function encodePng(raster: RasterData): Uint8Array {
  const { width, height, channelCount, samples } = raster;
  const png = new PNG({ width, height });
  const scale = raster.maxValue > 0 ? 255 / raster.maxValue : 1;
  const to8 = (v: number) => Math.max(0, Math.min(255, Math.round(v * scale)));

  for (let i = 0; i < width * height; i++) {
    const src = i * channelCount;
    const dst = i * 4;
    if (channelCount === 1) {
      const v = to8(samples[src]);
      png.data[dst] = v;
      png.data[dst + 1] = v;
      png.data[dst + 2] = v;
      png.data[dst + 3] = 255;
    } else {
      png.data[dst] = to8(samples[src]);
      png.data[dst + 1] = to8(samples[src + 1]);
      png.data[dst + 2] = to8(samples[src + 2]);
      png.data[dst + 3] = channelCount === 4 ? to8(samples[src + 3]) : 255;
    }
  }

  const buffer = PNG.sync.write(png, { colorType: COLOR_TYPES[channelCount] });
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}
