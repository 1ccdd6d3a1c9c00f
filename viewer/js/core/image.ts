/**
 * Image buffer model shared by the viewer host and page.
 *
 * Samples are stored row-major with channels interleaved. A `RasterData`
 * is in file order (row 0 at the top); an `ImageBuffer` has been flipped
 * once at load time so that row 0 is the bottom row, matching the display
 * coordinates (origin at the bottom-left).
 */

export type ImageSamples = Uint8Array | Uint16Array | Float32Array;

export type ChannelCount = 1 | 3 | 4;

/** How a pixel's samples are read, resolved once when the buffer is built. */
export type SampleLayout =
  | { kind: "scalar" }
  | { kind: "vector"; size: 3 | 4 };

export type Sample =
  | { kind: "scalar"; value: number }
  | { kind: "vector"; values: number[] };

export interface RasterData {
  width: number;
  height: number;
  channelCount: ChannelCount;
  samples: ImageSamples;
  /** Nominal full-scale value of the source format (255 for 8-bit). */
  maxValue: number;
}

export interface ImageBuffer extends Readonly<RasterData> {
  readonly layout: SampleLayout;
}

export function isChannelCount(n: number): n is ChannelCount {
  return n === 1 || n === 3 || n === 4;
}

function layoutFor(channelCount: ChannelCount): SampleLayout {
  return channelCount === 1 ? { kind: "scalar" } : { kind: "vector", size: channelCount };
}

/**
 * Wrap raster data as an immutable buffer. The samples array is taken over;
 * callers must not write to it afterwards.
 */
export function createImageBuffer(raster: RasterData): ImageBuffer {
  const { width, height, channelCount, samples, maxValue } = raster;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`invalid image size ${width}x${height}`);
  }
  if (samples.length !== width * height * channelCount) {
    throw new RangeError(
      `expected ${width * height * channelCount} samples for ${width}x${height}x${channelCount}, got ${samples.length}`,
    );
  }
  return Object.freeze({
    width,
    height,
    channelCount,
    samples,
    maxValue,
    layout: Object.freeze(layoutFor(channelCount)),
  });
}

/** Reverse row order into a new raster; the input is left untouched. */
export function flipVertical(raster: RasterData): RasterData {
  const { width, height, channelCount, samples } = raster;
  const rowLength = width * channelCount;
  const flipped = samples.slice();
  for (let row = 0; row < height; row++) {
    const src = (height - 1 - row) * rowLength;
    flipped.set(samples.subarray(src, src + rowLength), row * rowLength);
  }
  return { ...raster, samples: flipped };
}

/**
 * Read the sample(s) at (row, col). Indices must already be in range;
 * see `mapToPixel` for clamping.
 */
export function readSample(image: ImageBuffer, row: number, col: number): Sample {
  const base = (row * image.width + col) * image.channelCount;
  const layout = image.layout;
  switch (layout.kind) {
    case "scalar":
      return { kind: "scalar", value: image.samples[base] };
    case "vector":
      return { kind: "vector", values: Array.from(image.samples.subarray(base, base + layout.size)) };
  }
}

/**
 * Build raster data from nested rows, top row first.
 * Scalars give one channel; arrays give one channel per element.
 */
export function rasterFromRows(rows: number[][] | number[][][], maxValue: number = 255): RasterData {
  const height = rows.length;
  const width = height > 0 ? rows[0].length : 0;
  const flat: number[] = [];
  let channelCount = 1;
  for (const row of rows) {
    if (row.length !== width) throw new RangeError("rows must have equal length");
    for (const px of row) {
      if (Array.isArray(px)) {
        channelCount = px.length;
        flat.push(...px);
      } else {
        flat.push(px);
      }
    }
  }
  if (!isChannelCount(channelCount)) throw new RangeError(`unsupported channel count ${channelCount}`);
  const samples = maxValue > 255 ? Uint16Array.from(flat) : Uint8Array.from(flat);
  return { width, height, channelCount, samples, maxValue };
}
