/**
 * Pixel inspector: the status line describing the sample under the cursor.
 */

import { mapToPixel, type DisplayPos, type PixelIndex } from "./coordinates";
import { formatSignificant } from "./format";
import { readSample, type ImageBuffer, type Sample } from "./image";

/** Anything that can hand out the current buffer. */
export interface ImageSource {
  readonly image: ImageBuffer;
}

function formatSample(sample: Sample): string {
  switch (sample.kind) {
    case "scalar":
      return formatSignificant(sample.value);
    case "vector":
      return `[${sample.values.map((v) => formatSignificant(v)).join(" ")}]`;
  }
}

/** `pos: (x, y)  pixel: (row, col)  value: v` */
export function formatStatus(pos: DisplayPos, pixel: PixelIndex, sample: Sample): string {
  return (
    `pos: (${pos.x.toFixed(1)}, ${pos.y.toFixed(1)})  ` +
    `pixel: (${pixel.row}, ${pixel.col})  ` +
    `value: ${formatSample(sample)}`
  );
}

export class PixelInspector {
  private text = "";

  constructor(private readonly source: ImageSource) {}

  /** Current status line; empty while the cursor is off the image. */
  get status(): string {
    return this.text;
  }

  onPointerMove(pos: DisplayPos): string {
    const image = this.source.image;
    const pixel = mapToPixel(pos, image);
    this.text = formatStatus(pos, pixel, readSample(image, pixel.row, pixel.col));
    return this.text;
  }

  onPointerExit(): string {
    this.text = "";
    return this.text;
  }
}
