/**
 * Colormap definitions for single-channel images.
 * Tone-mapped intensities in [0, 1] index a 256-entry LUT.
 */

// Control points for interpolation
export const COLORMAP_POINTS = {
  gray: [[0, 0, 0], [255, 255, 255]],
  inferno: [
    [0, 0, 4], [40, 11, 84], [101, 21, 110], [159, 42, 99],
    [212, 72, 66], [245, 125, 21], [252, 193, 57], [252, 255, 164],
  ],
  viridis: [
    [68, 1, 84], [72, 36, 117], [65, 68, 135], [53, 95, 141],
    [42, 120, 142], [33, 145, 140], [34, 168, 132], [68, 191, 112],
    [122, 209, 81], [189, 223, 38], [253, 231, 37],
  ],
  plasma: [
    [13, 8, 135], [75, 3, 161], [126, 3, 168], [168, 34, 150],
    [203, 70, 121], [229, 107, 93], [248, 148, 65], [253, 195, 40], [240, 249, 33],
  ],
  magma: [
    [0, 0, 4], [28, 16, 68], [79, 18, 123], [129, 37, 129],
    [181, 54, 122], [229, 80, 100], [251, 135, 97], [254, 194, 135], [252, 253, 191],
  ],
  hot: [
    [0, 0, 0], [87, 0, 0], [173, 0, 0], [255, 0, 0],
    [255, 87, 0], [255, 173, 0], [255, 255, 0], [255, 255, 128], [255, 255, 255],
  ],
} satisfies Record<string, number[][]>;

export type ColormapName = keyof typeof COLORMAP_POINTS;

/** Available colormap names, gray first */
export const COLORMAP_NAMES = Object.keys(COLORMAP_POINTS).filter(isColormapName);

export const DEFAULT_COLORMAP: ColormapName = "gray";

export function isColormapName(name: string): name is ColormapName {
  return Object.prototype.hasOwnProperty.call(COLORMAP_POINTS, name);
}

/** Create 256-entry LUT from control points */
export function createColormapLUT(points: number[][]): Uint8Array {
  const lut = new Uint8Array(256 * 3);
  for (let i = 0; i < 256; i++) {
    const t = (i / 255) * (points.length - 1);
    const idx = Math.floor(t);
    const frac = t - idx;
    const p0 = points[Math.min(idx, points.length - 1)];
    const p1 = points[Math.min(idx + 1, points.length - 1)];
    lut[i * 3] = Math.round(p0[0] + frac * (p1[0] - p0[0]));
    lut[i * 3 + 1] = Math.round(p0[1] + frac * (p1[1] - p0[1]));
    lut[i * 3 + 2] = Math.round(p0[2] + frac * (p1[2] - p0[2]));
  }
  return lut;
}

/** Pre-computed LUTs for all colormaps (flat Uint8Array, 256*3 bytes each) */
export const COLORMAPS: Record<ColormapName, Uint8Array> = {
  gray: createColormapLUT(COLORMAP_POINTS.gray),
  inferno: createColormapLUT(COLORMAP_POINTS.inferno),
  viridis: createColormapLUT(COLORMAP_POINTS.viridis),
  plasma: createColormapLUT(COLORMAP_POINTS.plasma),
  magma: createColormapLUT(COLORMAP_POINTS.magma),
  hot: createColormapLUT(COLORMAP_POINTS.hot),
};

/** CSS gradient for the histogram's colorbar strip. */
export function colormapGradient(name: ColormapName, direction = "to top"): string {
  const points = COLORMAP_POINTS[name];
  const stops = points.map(([r, g, b], i) => {
    const pct = points.length === 1 ? 0 : (i / (points.length - 1)) * 100;
    return `rgb(${r}, ${g}, ${b}) ${pct.toFixed(1)}%`;
  });
  return `linear-gradient(${direction}, ${stops.join(", ")})`;
}
