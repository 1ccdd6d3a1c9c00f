/**
 * Netpbm codec: PGM and PPM, plain (P2, P3) and raw (P5, P6).
 * Rasters are in file order, top row first.
 */

import type { ChannelCount, ImageSamples, RasterData } from "../../js/core/image";

export type NetpbmMagic = "P2" | "P3" | "P5" | "P6";

/** Thrown for malformed input; the caller attaches the path. */
export class NetpbmFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NetpbmFormatError";
  }
}

const HASH = 0x23;
const LF = 0x0a;
const CR = 0x0d;

function isSpace(byte: number): boolean {
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}

function isNetpbmMagic(text: string): text is NetpbmMagic {
  return text === "P2" || text === "P3" || text === "P5" || text === "P6";
}

/** Whitespace-separated tokens with `#` comments running to end of line. */
class TokenReader {
  pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  private skipSpaceAndComments(): void {
    const { bytes } = this;
    while (this.pos < bytes.length) {
      const b = bytes[this.pos];
      if (b === HASH) {
        while (this.pos < bytes.length && bytes[this.pos] !== LF && bytes[this.pos] !== CR) this.pos++;
      } else if (isSpace(b)) {
        this.pos++;
      } else {
        return;
      }
    }
  }

  token(): string | null {
    this.skipSpaceAndComments();
    const start = this.pos;
    while (this.pos < this.bytes.length && !isSpace(this.bytes[this.pos]) && this.bytes[this.pos] !== HASH) {
      this.pos++;
    }
    if (this.pos === start) return null;
    return String.fromCharCode(...this.bytes.subarray(start, this.pos));
  }

  positiveInt(name: string): number {
    const text = this.token();
    if (text === null) throw new NetpbmFormatError(`truncated header: missing ${name}`);
    if (!/^\d+$/.test(text)) throw new NetpbmFormatError(`invalid ${name} "${text}"`);
    const value = Number(text);
    if (value <= 0) throw new NetpbmFormatError(`${name} must be positive`);
    return value;
  }
}

export function isNetpbm(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x50 && isNetpbmMagic(String.fromCharCode(bytes[0], bytes[1]));
}

/**
 * Decode a PGM/PPM file.
 * @throws NetpbmFormatError on a bad header, bad sample or short raster
 */
export function decodeNetpbm(bytes: Uint8Array): RasterData {
  const reader = new TokenReader(bytes);
  const magic = reader.token();
  if (magic === null || !isNetpbmMagic(magic)) {
    throw new NetpbmFormatError(`unsupported magic number ${JSON.stringify(magic ?? "")}`);
  }

  const width = reader.positiveInt("width");
  const height = reader.positiveInt("height");
  const maxValue = reader.positiveInt("maxval");
  if (maxValue > 65535) throw new NetpbmFormatError(`maxval ${maxValue} exceeds 65535`);

  const channelCount: ChannelCount = magic === "P2" || magic === "P5" ? 1 : 3;
  const count = width * height * channelCount;
  const samples: ImageSamples = maxValue > 255 ? new Uint16Array(count) : new Uint8Array(count);

  if (magic === "P2" || magic === "P3") {
    for (let i = 0; i < count; i++) {
      const text = reader.token();
      if (text === null) throw new NetpbmFormatError(`truncated raster: ${i} of ${count} samples`);
      if (!/^\d+$/.test(text)) throw new NetpbmFormatError(`invalid sample "${text}"`);
      const value = Number(text);
      if (value > maxValue) throw new NetpbmFormatError(`sample ${value} exceeds maxval ${maxValue}`);
      samples[i] = value;
    }
    return { width, height, channelCount, samples, maxValue };
  }

  // Exactly one whitespace byte separates maxval from a raw raster
  const start = reader.pos + 1;
  const bytesPerSample = maxValue > 255 ? 2 : 1;
  const needed = count * bytesPerSample;
  if (bytes.length - start < needed) {
    throw new NetpbmFormatError(`truncated raster: ${Math.max(0, bytes.length - start)} of ${needed} bytes`);
  }
  if (bytesPerSample === 1) {
    samples.set(bytes.subarray(start, start + needed));
  } else {
    for (let i = 0; i < count; i++) {
      samples[i] = (bytes[start + 2 * i] << 8) | bytes[start + 2 * i + 1];
    }
  }
  return { width, height, channelCount, samples, maxValue };
}

function rgbAt(raster: RasterData, pixel: number): [number, number, number] {
  const { samples, channelCount } = raster;
  const base = pixel * channelCount;
  if (channelCount === 1) {
    const v = samples[base];
    return [v, v, v];
  }
  return [samples[base], samples[base + 1], samples[base + 2]];
}

/**
 * Encode a raster as PPM. Gray rasters are written as equal RGB triples and
 * a fourth channel is dropped. Plain output has one pixel per line.
 */
export function encodePpm(raster: RasterData, magic: "P3" | "P6" = "P3"): Uint8Array {
  const { width, height } = raster;
  const maxValue = Math.max(1, Math.min(65535, Math.round(raster.maxValue)));
  const header = `${magic}\n${width} ${height}\n${maxValue}\n`;
  const pixels = width * height;

  if (magic === "P3") {
    const lines: string[] = [header];
    for (let i = 0; i < pixels; i++) {
      const [r, g, b] = rgbAt(raster, i);
      lines.push(`${r} ${g} ${b}\n`);
    }
    return new TextEncoder().encode(lines.join(""));
  }

  const headerBytes = new TextEncoder().encode(header);
  const bytesPerSample = maxValue > 255 ? 2 : 1;
  const out = new Uint8Array(headerBytes.length + pixels * 3 * bytesPerSample);
  out.set(headerBytes, 0);
  let offset = headerBytes.length;
  for (let i = 0; i < pixels; i++) {
    for (const v of rgbAt(raster, i)) {
      if (bytesPerSample === 2) {
        out[offset++] = (v >> 8) & 0xff;
      }
      out[offset++] = v & 0xff;
    }
  }
  return out;
}
