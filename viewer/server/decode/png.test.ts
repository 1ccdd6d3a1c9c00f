import { describe, it, expect } from "vitest";
import { rasterFromRows } from "../../js/core/image";
import { decodePng, encodePng, isPng } from "./png";

describe("png", () => {
  it("keeps gray images single channel", () => {
    const bytes = encodePng(rasterFromRows([[0, 128], [255, 7]]));
    expect(isPng(bytes)).toBe(true);
    const raster = decodePng(bytes);
    expect(raster.channelCount).toBe(1);
    expect(raster.width).toBe(2);
    expect(raster.height).toBe(2);
    expect(Array.from(raster.samples)).toEqual([0, 128, 255, 7]);
  });

  it("keeps RGB and RGBA channels", () => {
    const rgb = decodePng(encodePng(rasterFromRows([[[10, 20, 30], [40, 50, 60]]])));
    expect(rgb.channelCount).toBe(3);
    expect(Array.from(rgb.samples)).toEqual([10, 20, 30, 40, 50, 60]);

    const rgba = decodePng(encodePng(rasterFromRows([[[10, 20, 30, 40]]])));
    expect(rgba.channelCount).toBe(4);
    expect(Array.from(rgba.samples)).toEqual([10, 20, 30, 40]);
  });

  it("rescales deep rasters to 8 bits", () => {
    const raster = decodePng(encodePng(rasterFromRows([[65535, 0]], 65535)));
    expect(raster.maxValue).toBe(255);
    expect(Array.from(raster.samples)).toEqual([255, 0]);
  });

  it("rejects other data", () => {
    expect(isPng(new TextEncoder().encode("P3\n1 1\n255\n"))).toBe(false);
  });
});
