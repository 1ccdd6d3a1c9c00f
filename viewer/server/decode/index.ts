/**
 * Image file IO for the host. Format is sniffed from the leading bytes,
 * not the file extension.
 */

import { readFile, writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { createImageBuffer, flipVertical, type ImageBuffer, type RasterData } from "../../js/core/image";
import { DecodeError, errorMessage } from "../errors";
import { decodeNetpbm, encodePpm, isNetpbm } from "./netpbm";
import { decodePng, encodePng, isPng } from "./png";

export { decodeNetpbm, encodePpm, isNetpbm, NetpbmFormatError, type NetpbmMagic } from "./netpbm";
export { decodePng, encodePng, isPng } from "./png";

export type ImageFormat = "ppm" | "png";

/**
 * Decode file bytes into raster data in file order.
 * @throws DecodeError for unsupported or corrupt data
 */
export function decodeImage(bytes: Uint8Array, path: string): RasterData {
  try {
    if (isNetpbm(bytes)) return decodeNetpbm(bytes);
    if (isPng(bytes)) return decodePng(bytes);
  } catch (error) {
    throw new DecodeError(path, errorMessage(error), { cause: error });
  }
  throw new DecodeError(path, bytes.length === 0 ? "file is empty" : "unsupported image format");
}

/**
 * Read and decode an image file, flipped so row 0 is the bottom row.
 * @throws DecodeError when the file is missing, unreadable or not an image
 */
export async function readImageFile(path: string): Promise<ImageBuffer> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (error) {
    throw new DecodeError(path, errorMessage(error), { cause: error });
  }
  const raster = decodeImage(bytes, path);
  try {
    return createImageBuffer(flipVertical(raster));
  } catch (error) {
    throw new DecodeError(path, errorMessage(error), { cause: error });
  }
}

export function formatForPath(path: string): ImageFormat {
  return extname(path).toLowerCase() === ".png" ? "png" : "ppm";
}

export function encodeImage(raster: RasterData, format: ImageFormat): Uint8Array {
  return format === "png" ? encodePng(raster) : encodePpm(raster, "P3");
}

/**
 * Write raster data in file order. The format follows the extension:
 * `.png` is PNG, anything else plain PPM.
 */
export async function writeImageFile(path: string, raster: RasterData): Promise<void> {
  await writeFile(path, encodeImage(raster, formatForPath(path)));
}
