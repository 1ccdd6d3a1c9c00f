/**
 * Level/histogram controller: per-channel level windows, the isoline marker,
 * and the linear tone map that turns samples into display intensities.
 */

import { COLORMAPS, type ColormapName } from "./colormaps";
import { clamp } from "./format";
import { computeHistogram, findDataRange, type HistogramData } from "./histogram";
import type { ImageBuffer } from "./image";

export interface LevelRange {
  lo: number;
  hi: number;
}

export interface LevelOptions {
  /** Keep hand-set ranges across reloads instead of resetting to data defaults. */
  preserveLevels?: boolean;
  /** Initial isoline value. */
  isoline?: number;
  /** Histogram bin count. */
  bins?: number;
}

/** Intensity every sample maps to when the window has zero width. */
export const DEGENERATE_LEVEL = 0.5;

/**
 * Linear tone map: clamp((sample - lo) / (hi - lo), 0, 1).
 * A zero-width window maps everything to mid-level; a NaN sample maps to 0.
 */
export function toneMap(sample: number, range: LevelRange): number {
  const { lo, hi } = range;
  if (!(hi > lo)) return DEGENERATE_LEVEL;
  const t = (sample - lo) / (hi - lo);
  return Number.isNaN(t) ? 0 : clamp(t, 0, 1);
}

/** Data-derived default window for each channel: its min and max. */
export function defaultLevelRanges(image: ImageBuffer): LevelRange[] {
  return Array.from({ length: image.channelCount }, (_, c) => {
    const { min, max } = findDataRange(image, c);
    return { lo: min, hi: max };
  });
}

/**
 * Normalize a requested window: non-finite bounds fall back to the default
 * bound and an inverted pair is swapped.
 */
export function normalizeRange(lo: number, hi: number, fallback: LevelRange): LevelRange {
  const a = Number.isFinite(lo) ? lo : fallback.lo;
  const b = Number.isFinite(hi) ? hi : fallback.hi;
  return a <= b ? { lo: a, hi: b } : { lo: b, hi: a };
}

export class LevelController {
  private ranges: LevelRange[];
  private defaults: LevelRange[];
  private pinned = false;
  private isoline: number;
  private histogramData: HistogramData;
  private readonly preserveLevels: boolean;
  private readonly bins: number | undefined;

  constructor(image: ImageBuffer, options: LevelOptions = {}) {
    this.preserveLevels = options.preserveLevels ?? false;
    this.bins = options.bins;
    this.isoline = options.isoline !== undefined && Number.isFinite(options.isoline) ? options.isoline : 0;
    this.defaults = defaultLevelRanges(image);
    this.ranges = this.defaults.map((r) => ({ ...r }));
    this.histogramData = this.computeHistogram(image);
  }

  computeHistogram(image: ImageBuffer): HistogramData {
    return computeHistogram(image, this.bins);
  }

  get histogram(): HistogramData {
    return this.histogramData;
  }

  get levelRanges(): readonly LevelRange[] {
    return this.ranges;
  }

  get defaultRanges(): readonly LevelRange[] {
    return this.defaults;
  }

  get isPinned(): boolean {
    return this.pinned;
  }

  get isolineValue(): number {
    return this.isoline;
  }

  levelRange(channel: number = 0): LevelRange {
    return this.ranges[channel] ?? this.ranges[0];
  }

  /**
   * Set the window for one channel, or for all channels when `channel` is
   * omitted. Inverted bounds are swapped; a channel that does not exist is
   * ignored. The range counts as hand-set from here on.
   */
  setLevelRange(lo: number, hi: number, channel?: number): void {
    if (channel === undefined) {
      this.ranges = this.ranges.map((_, c) => normalizeRange(lo, hi, this.defaults[c]));
    } else if (Number.isInteger(channel) && channel >= 0 && channel < this.ranges.length) {
      this.ranges = this.ranges.map((r, c) => (c === channel ? normalizeRange(lo, hi, this.defaults[c]) : r));
    } else {
      return;
    }
    this.pinned = true;
  }

  /** Move the isoline marker. Independent of the level windows; NaN and infinities are ignored. */
  setIsolineValue(value: number): void {
    if (!Number.isFinite(value)) return;
    this.isoline = value;
  }

  /** Drop any hand-set ranges and recompute defaults from `image`. */
  resetLevels(image: ImageBuffer): void {
    this.defaults = defaultLevelRanges(image);
    this.ranges = this.defaults.map((r) => ({ ...r }));
    this.pinned = false;
  }

  /**
   * React to a new current buffer. Levels reset to the new data's defaults
   * unless `preserveLevels` is on and the user has pinned a range for a
   * buffer with the same channel count.
   */
  onImageChanged(image: ImageBuffer): void {
    this.histogramData = this.computeHistogram(image);
    if (this.preserveLevels && this.pinned && image.channelCount === this.ranges.length) {
      this.defaults = defaultLevelRanges(image);
      return;
    }
    this.resetLevels(image);
  }
}

/**
 * Tone map a whole buffer into RGBA bytes, rows in buffer order.
 * Scalar buffers go through the colormap LUT; vector buffers map each color
 * channel through its own window. A fourth channel is alpha and is scaled by
 * the format's full-scale value rather than tone mapped.
 */
export function renderRGBA(
  image: ImageBuffer,
  ranges: readonly LevelRange[],
  cmapName: ColormapName = "gray",
): Uint8ClampedArray {
  const { width, height, samples, channelCount, layout } = image;
  const rgba = new Uint8ClampedArray(width * height * 4);
  const pixels = width * height;

  if (layout.kind === "scalar") {
    const lut = COLORMAPS[cmapName];
    const range = ranges[0];
    for (let i = 0; i < pixels; i++) {
      const lutIdx = Math.round(toneMap(samples[i], range) * 255) * 3;
      const j = i * 4;
      rgba[j] = lut[lutIdx];
      rgba[j + 1] = lut[lutIdx + 1];
      rgba[j + 2] = lut[lutIdx + 2];
      rgba[j + 3] = 255;
    }
    return rgba;
  }

  const alphaScale = image.maxValue > 0 ? 255 / image.maxValue : 1;
  for (let i = 0; i < pixels; i++) {
    const src = i * channelCount;
    const j = i * 4;
    rgba[j] = Math.round(toneMap(samples[src], ranges[0]) * 255);
    rgba[j + 1] = Math.round(toneMap(samples[src + 1], ranges[1]) * 255);
    rgba[j + 2] = Math.round(toneMap(samples[src + 2], ranges[2]) * 255);
    rgba[j + 3] = layout.size === 4 ? Math.round(samples[src + 3] * alphaScale) : 255;
  }
  return rgba;
}
