/**
 * Histogram computation over an image buffer.
 * Used for the level panel only; the tone map never reads it.
 */

import type { ImageBuffer } from "./image";

export const DEFAULT_HISTOGRAM_BINS = 256;

export interface HistogramData {
  bins: number;
  /** Lower edge of the first bin, shared by every channel. */
  min: number;
  /** Upper edge of the last bin. */
  max: number;
  /** Raw counts, `channels[c][i]` for channel c and bin i. */
  channels: number[][];
}

/** Find min/max over the finite samples of a buffer; zeros when there are none. */
export function findDataRange(image: ImageBuffer, channel?: number): { min: number; max: number } {
  const { samples, channelCount } = image;
  const start = channel ?? 0;
  const step = channel === undefined ? 1 : channelCount;
  let min = Infinity, max = -Infinity;
  for (let i = start; i < samples.length; i += step) {
    const v = samples[i];
    if (!isFinite(v)) continue;
    if (v < min) min = v;
    if (v > max) max = v;
  }
  if (min === Infinity) return { min: 0, max: 0 };
  return { min, max };
}

/**
 * Bin every channel of a buffer over the buffer-wide value range.
 * Non-finite samples are skipped; a constant buffer lands entirely in bin 0.
 */
export function computeHistogram(image: ImageBuffer, bins: number = DEFAULT_HISTOGRAM_BINS): HistogramData {
  const numBins = Number.isFinite(bins) && bins >= 1 ? Math.floor(bins) : DEFAULT_HISTOGRAM_BINS;
  const { samples, channelCount } = image;
  const { min, max } = findDataRange(image);
  const range = max - min;
  const channels = Array.from({ length: channelCount }, () => new Array<number>(numBins).fill(0));

  for (let i = 0; i < samples.length; i++) {
    const v = samples[i];
    if (!isFinite(v)) continue;
    const binIdx = range > 0 ? Math.min(numBins - 1, Math.floor(((v - min) / range) * numBins)) : 0;
    channels[i % channelCount][binIdx]++;
  }

  return { bins: numBins, min, max, channels };
}

/**
 * Sum adjacent bins down to `displayBins` for drawing, normalized to 0-1.
 * Trailing bins that do not fill a group are folded into the last one.
 */
export function reduceBins(counts: readonly number[], displayBins: number): number[] {
  const groups = Math.max(1, Math.min(displayBins, counts.length));
  const ratio = counts.length / groups;
  const reduced = new Array<number>(groups).fill(0);
  for (let i = 0; i < counts.length; i++) {
    reduced[Math.min(groups - 1, Math.floor(i / ratio))] += counts[i];
  }
  const maxVal = Math.max(...reduced, 0);
  if (maxVal > 0) {
    for (let i = 0; i < groups; i++) reduced[i] /= maxVal;
  }
  return reduced;
}
