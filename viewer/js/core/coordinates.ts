/**
 * Coordinate mapping between the page canvas, display space and buffer indices.
 *
 * Display space is in image-pixel units with the origin at the bottom-left:
 * pixel (row, col) covers x in [col, col + 1) and y in [row, row + 1).
 */

import { clamp } from "./format";

export interface DisplayPos {
  x: number;
  y: number;
}

export interface BufferShape {
  width: number;
  height: number;
}

export interface PixelIndex {
  row: number;
  col: number;
}

/** Canvas view transform: canvas = pan + zoom * scale * image. */
export interface ViewTransform {
  zoom: number;
  panX: number;
  panY: number;
  /** Canvas pixels per image pixel at zoom 1. */
  scale: number;
}

function toIndex(value: number, dim: number): number {
  if (dim <= 0 || Number.isNaN(value)) return 0;
  return clamp(Math.floor(value), 0, dim - 1);
}

/**
 * Map a display position to buffer indices. Out-of-range input is clamped
 * to the nearest edge and NaN maps to 0, so this never fails.
 */
export function mapToPixel(pos: DisplayPos, shape: BufferShape): PixelIndex {
  return {
    row: toIndex(pos.y, shape.height),
    col: toIndex(pos.x, shape.width),
  };
}

/**
 * Convert a canvas position (top-left origin) to display space
 * (bottom-left origin) under the current zoom and pan.
 */
export function canvasToDisplay(
  canvasX: number,
  canvasY: number,
  view: ViewTransform,
  imageHeight: number,
): DisplayPos {
  const unit = view.zoom * view.scale;
  if (!(unit > 0)) return { x: 0, y: 0 };
  return {
    x: (canvasX - view.panX) / unit,
    y: imageHeight - (canvasY - view.panY) / unit,
  };
}

/**
 * Pixels per image pixel that fit the whole image in a canvas.
 * @returns Largest scale that keeps the image inside the canvas
 */
export function fitScale(shape: BufferShape, canvasWidth: number, canvasHeight: number): number {
  if (shape.width <= 0 || shape.height <= 0) return 1;
  return Math.min(canvasWidth / shape.width, canvasHeight / shape.height);
}
