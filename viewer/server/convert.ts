/**
 * PPM to PNG conversion, for a single file or every `.ppm` in a directory.
 */

import { readFile, readdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { decodeImage, encodePng } from "./decode";
import { UsageError, errorMessage } from "./errors";

const PPM_EXTENSION = /\.ppm$/i;

/** `x.ppm` becomes `x.png` beside it. */
export function pngPathFor(ppmPath: string): string {
  if (!PPM_EXTENSION.test(ppmPath)) throw new UsageError(`not a .ppm file: ${ppmPath}`);
  return ppmPath.replace(PPM_EXTENSION, ".png");
}

/**
 * Convert one file.
 * @returns Path of the written PNG
 */
export async function convertFile(ppmPath: string): Promise<string> {
  const destination = pngPathFor(ppmPath);
  const raster = decodeImage(await readFile(ppmPath), ppmPath);
  await writeFile(destination, encodePng(raster));
  return destination;
}

/**
 * Convert a file, or each `.ppm` directly inside a directory (sorted by name).
 * @returns Paths of the written PNGs
 */
export async function convertPath(target: string): Promise<string[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(target)).isDirectory();
  } catch (error) {
    throw new UsageError(`cannot convert ${target}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isDirectory) return [await convertFile(target)];

  const entries = (await readdir(target)).filter((name) => PPM_EXTENSION.test(name)).sort();
  const written: string[] = [];
  for (const name of entries) {
    written.push(await convertFile(join(target, name)));
  }
  return written;
}
