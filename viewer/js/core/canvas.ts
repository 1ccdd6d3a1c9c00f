/**
 * Canvas rendering utilities for the viewer page.
 * Frame blitting with zoom/pan, the vertical histogram panel and its isoline.
 */

import { colors } from "./colors";
import { clamp } from "./format";
import { reduceBins, type HistogramData } from "./histogram";
import type { LevelRange } from "./levels";
import type { Frame } from "./protocol";
import type { ViewTransform } from "./coordinates";

// ============================================================================
// Frame rendering
// ============================================================================

/**
 * Copy a frame's RGBA bytes into an offscreen canvas at native resolution.
 * Row 0 of the canvas holds buffer row 0 (the bottom of the image).
 */
export function frameToCanvas(frame: Frame): HTMLCanvasElement {
  const { width, height } = frame.info;
  const offscreen = document.createElement("canvas");
  offscreen.width = width;
  offscreen.height = height;
  const offCtx = offscreen.getContext("2d");
  if (!offCtx) return offscreen;

  const pixels = new Uint8ClampedArray(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength);
  const imgData = offCtx.createImageData(width, height);
  imgData.data.set(pixels);
  offCtx.putImageData(imgData, 0, 0);
  return offscreen;
}

/**
 * Draw a frame with zoom and pan, y axis pointing up so buffer row 0
 * lands at the bottom.
 */
export function drawFrame(
  ctx: CanvasRenderingContext2D,
  source: HTMLCanvasElement,
  canvasWidth: number,
  canvasHeight: number,
  view: ViewTransform,
): void {
  ctx.imageSmoothingEnabled = false;
  ctx.fillStyle = colors.bgCanvas;
  ctx.fillRect(0, 0, canvasWidth, canvasHeight);
  ctx.save();
  ctx.translate(view.panX, view.panY);
  ctx.scale(view.zoom * view.scale, view.zoom * view.scale);
  ctx.translate(0, source.height);
  ctx.scale(1, -1);
  ctx.drawImage(source, 0, 0);
  ctx.restore();
}

// ============================================================================
// Histogram panel geometry
// ============================================================================

/** Vertical padding of the histogram panel in CSS pixels */
export const HISTOGRAM_PADDING = 6;

/** Map a data value to a y position on a vertical histogram (max at top). */
export function valueToPanelY(value: number, min: number, max: number, height: number): number {
  const drawHeight = height - 2 * HISTOGRAM_PADDING;
  if (!(max > min)) return HISTOGRAM_PADDING + drawHeight / 2;
  return HISTOGRAM_PADDING + (1 - (value - min) / (max - min)) * drawHeight;
}

/** Inverse of `valueToPanelY`; positions past the ends keep extrapolating. */
export function panelYToValue(y: number, min: number, max: number, height: number): number {
  const drawHeight = height - 2 * HISTOGRAM_PADDING;
  if (!(max > min) || drawHeight <= 0) return min;
  return min + (1 - (y - HISTOGRAM_PADDING) / drawHeight) * (max - min);
}

// ============================================================================
// Histogram rendering
// ============================================================================

export interface HistogramStyle {
  /** One color per channel; a single entry draws scalar data. */
  channelColors: readonly string[];
  displayBins?: number;
}

/**
 * Render a vertical histogram: value on the y axis, counts as bars growing
 * to the right. The active level window is shaded.
 */
export function drawHistogram(
  ctx: CanvasRenderingContext2D,
  histogram: HistogramData,
  level: LevelRange,
  width: number,
  height: number,
  style: HistogramStyle,
): void {
  ctx.fillStyle = colors.bgPanel;
  ctx.fillRect(0, 0, width, height);

  const { min, max } = histogram;
  const top = valueToPanelY(level.hi, min, max, height);
  const bottom = valueToPanelY(level.lo, min, max, height);
  ctx.fillStyle = colors.levelRegion;
  ctx.fillRect(0, clamp(top, 0, height), width, clamp(bottom, 0, height) - clamp(top, 0, height));

  const displayBins = style.displayBins ?? 64;
  const drawHeight = height - 2 * HISTOGRAM_PADDING;
  const multi = histogram.channels.length > 1;
  ctx.globalAlpha = multi ? 0.6 : 1;

  histogram.channels.forEach((counts, c) => {
    const reduced = reduceBins(counts, displayBins);
    const barHeight = drawHeight / reduced.length;
    ctx.fillStyle = style.channelColors[c] ?? colors.barActive;
    for (let i = 0; i < reduced.length; i++) {
      const barWidth = reduced[i] * (width - 4);
      if (barWidth <= 0) continue;
      // Bin 0 is the lowest value, drawn at the bottom
      const y = HISTOGRAM_PADDING + drawHeight - (i + 1) * barHeight;
      ctx.fillRect(2, y, barWidth, Math.max(1, barHeight - 0.5));
    }
  });
  ctx.globalAlpha = 1;
}

/**
 * Draw the isoline marker across the histogram panel.
 * @param active - Whether the line is being dragged
 */
export function drawIsoline(
  ctx: CanvasRenderingContext2D,
  y: number,
  width: number,
  active: boolean = false,
): void {
  ctx.save();
  ctx.strokeStyle = active ? colors.accentOrange : colors.accentGreen;
  ctx.lineWidth = active ? 2 : 1.5;
  ctx.beginPath();
  ctx.moveTo(0, y);
  ctx.lineTo(width, y);
  ctx.stroke();
  ctx.restore();
}

/**
 * Size a canvas for the device pixel ratio and scale its context so drawing
 * code can work in CSS pixels.
 */
export function prepareHiDPI(canvas: HTMLCanvasElement, width: number, height: number): CanvasRenderingContext2D | null {
  const dpr = window.devicePixelRatio || 1;
  canvas.width = Math.round(width * dpr);
  canvas.height = Math.round(height * dpr);
  const ctx = canvas.getContext("2d");
  if (!ctx) return null;
  ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
  return ctx;
}
