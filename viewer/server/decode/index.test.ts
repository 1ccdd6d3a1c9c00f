import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { rasterFromRows, readSample } from "../../js/core/image";
import { DecodeError } from "../errors";
import { formatForPath, readImageFile, writeImageFile } from "./index";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "imview-decode-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function expectDecodeError(path: string, message: string): Promise<void> {
  const error = await readImageFile(path).then(
    () => null,
    (e: unknown) => e,
  );
  expect(error).toBeInstanceOf(DecodeError);
  if (!(error instanceof DecodeError)) return;
  expect(error.code).toBe("DECODE");
  expect(error.path).toBe(path);
  expect(error.message).toBe(`${path}: ${message}`);
}

describe("readImageFile", () => {
  it("flips rows so the bottom row comes first", async () => {
    const path = join(dir, "img.pgm");
    await writeFile(path, "P2\n2 2\n255\n10 20\n30 40\n");
    const image = await readImageFile(path);
    expect(image.width).toBe(2);
    expect(image.height).toBe(2);
    expect(readSample(image, 0, 0)).toEqual({ kind: "scalar", value: 30 });
    expect(readSample(image, 1, 1)).toEqual({ kind: "scalar", value: 20 });
  });

  it("sniffs the format instead of trusting the extension", async () => {
    const path = join(dir, "img.png");
    await writeFile(path, "P3\n1 1\n255\n1 2 3\n");
    const image = await readImageFile(path);
    expect(readSample(image, 0, 0)).toEqual({ kind: "vector", values: [1, 2, 3] });
  });

  it("rejects empty, unknown and truncated files", async () => {
    const empty = join(dir, "empty.ppm");
    await writeFile(empty, "");
    await expectDecodeError(empty, "file is empty");

    const text = join(dir, "notes.ppm");
    await writeFile(text, "hello");
    await expectDecodeError(text, "unsupported image format");

    const short = join(dir, "short.ppm");
    await writeFile(short, "P2\n2 2\n255\n1 2 3\n");
    await expectDecodeError(short, "truncated raster: 3 of 4 samples");
  });

  it("rejects a missing file", async () => {
    const path = join(dir, "missing.ppm");
    await expect(readImageFile(path)).rejects.toBeInstanceOf(DecodeError);
    await expect(readImageFile(path)).rejects.toMatchObject({ code: "DECODE", path });
  });
});

describe("writeImageFile", () => {
  it("writes PPM or PNG by extension", async () => {
    const raster = rasterFromRows([[[255, 0, 0], [0, 255, 0]], [[0, 0, 255], [9, 9, 9]]]);
    for (const name of ["out.ppm", "out.png"]) {
      const path = join(dir, name);
      await writeImageFile(path, raster);
      const image = await readImageFile(path);
      expect(image.channelCount).toBe(3);
      expect(readSample(image, 1, 0)).toEqual({ kind: "vector", values: [255, 0, 0] });
      expect(readSample(image, 0, 1)).toEqual({ kind: "vector", values: [9, 9, 9] });
    }
  });

  it("picks the format from the extension", () => {
    expect(formatForPath("a/b.PNG")).toBe("png");
    expect(formatForPath("a/b.ppm")).toBe("ppm");
    expect(formatForPath("a/b")).toBe("ppm");
  });
});
