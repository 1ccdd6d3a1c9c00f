import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createImageBuffer, flipVertical, rasterFromRows, type ImageBuffer } from "../js/core/image";
import { decodeFrame, type Frame, type ServerMessage } from "../js/core/protocol";
import { DecodeError } from "./errors";
import { FileChangeMonitor } from "./monitor";
import { ImageStore } from "./store";
import { RenderSurface, type PageConnection } from "./surface";

type Received = { kind: "text"; message: ServerMessage } | { kind: "frame"; frame: Frame };

class FakePage implements PageConnection {
  received: Received[] = [];

  sendText(text: string): void {
    const message: ServerMessage = JSON.parse(text);
    this.received.push({ kind: "text", message });
  }

  sendBinary(data: Uint8Array): void {
    const frame = decodeFrame(data);
    if (!frame) throw new Error("undecodable frame");
    this.received.push({ kind: "frame", frame });
  }

  kinds(): string[] {
    return this.received.map((r) => (r.kind === "frame" ? "frame" : r.message.topic));
  }

  messages(topic: ServerMessage["topic"]): ServerMessage[] {
    const out: ServerMessage[] = [];
    for (const r of this.received) {
      if (r.kind === "text" && r.message.topic === topic) out.push(r.message);
    }
    return out;
  }

  lastFrame(): Frame {
    const frames = this.received.flatMap((r) => (r.kind === "frame" ? [r.frame] : []));
    const frame = frames.at(-1);
    if (!frame) throw new Error("no frame received");
    return frame;
  }

  clear(): void {
    this.received = [];
  }
}

function loaded(rows: number[][]): ImageBuffer {
  return createImageBuffer(flipVertical(rasterFromRows(rows)));
}

function grayOf(frame: Frame): number[] {
  const out: number[] = [];
  for (let i = 0; i < frame.data.length; i += 4) out.push(frame.data[i]);
  return out;
}

let next: () => ImageBuffer;

async function openSurface(): Promise<RenderSurface> {
  next = () => loaded([[10, 20], [30, 40]]);
  const store = await ImageStore.open("mem", { read: async () => next(), title: "simple image viewer" });
  return new RenderSurface(store);
}

async function attached(surface: RenderSurface): Promise<FakePage> {
  const page = new FakePage();
  surface.attach(page);
  await surface.idle();
  return page;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("RenderSurface", () => {
  it("sends state and a frame to a new page", async () => {
    const surface = await openSurface();
    const page = await attached(surface);

    expect(page.kinds()).toEqual(["state", "frame"]);
    const [state] = page.messages("state");
    expect(state).toMatchObject({
      topic: "state",
      payload: { title: "simple image viewer", path: "mem", width: 2, height: 2, revision: 0, levels: [{ lo: 10, hi: 40 }] },
    });
    const frame = page.lastFrame();
    expect(frame.info).toEqual({ width: 2, height: 2, revision: 0 });
    expect(grayOf(frame)).toEqual([170, 255, 0, 85]);
  });

  it("answers pointer moves on the page that sent them", async () => {
    const surface = await openSurface();
    const a = await attached(surface);
    const b = await attached(surface);
    a.clear();
    b.clear();

    surface.handleMessage(a, JSON.stringify({ topic: "pointer/move", payload: { x: 1.5, y: 1.5 } }));
    surface.handleMessage(a, JSON.stringify({ topic: "pointer/exit" }));
    await surface.idle();

    expect(a.messages("status")).toEqual([
      { topic: "status", payload: { text: "pos: (1.5, 1.5)  pixel: (1, 1)  value: 20" } },
      { topic: "status", payload: { text: "" } },
    ]);
    expect(b.received).toEqual([]);
  });

  it("redraws every page after a level change", async () => {
    const surface = await openSurface();
    const a = await attached(surface);
    const b = await attached(surface);
    a.clear();
    b.clear();

    surface.handleMessage(a, JSON.stringify({ topic: "levels/set", payload: { lo: 5, hi: 5 } }));
    await surface.idle();

    for (const page of [a, b]) {
      expect(page.kinds()).toEqual(["state", "frame"]);
      expect(grayOf(page.lastFrame())).toEqual([128, 128, 128, 128]);
    }
    expect(a.messages("state")[0]).toMatchObject({ payload: { levels: [{ lo: 5, hi: 5 }], pinned: true } });

    a.clear();
    surface.handleMessage(a, JSON.stringify({ topic: "levels/reset" }));
    await surface.idle();
    expect(grayOf(a.lastFrame())).toEqual([170, 255, 0, 85]);
  });

  it("broadcasts isoline moves without a new frame", async () => {
    const surface = await openSurface();
    const a = await attached(surface);
    const b = await attached(surface);
    a.clear();
    b.clear();

    surface.handleMessage(a, JSON.stringify({ topic: "isoline/set", payload: { value: 25 } }));
    await surface.idle();

    expect(a.received).toEqual([{ kind: "text", message: { topic: "isoline", payload: { value: 25 } } }]);
    expect(b.received).toEqual(a.received);
    expect(surface.state.levels.levelRange()).toEqual({ lo: 10, hi: 40 });
  });

  it("keeps state serializable when a page sends an infinite isoline", async () => {
    const surface = await openSurface();
    const page = await attached(surface);
    page.clear();

    surface.handleMessage(page, '{"topic":"isoline/set","payload":{"value":1e999}}');
    surface.handleMessage(page, JSON.stringify({ topic: "levels/set", payload: { lo: 10, hi: 20 } }));
    await surface.idle();

    expect(surface.state.levels.isolineValue).toBe(0);
    expect(page.messages("isoline")).toEqual([{ topic: "isoline", payload: { value: 0 } }]);
    expect(page.messages("state")[0]).toMatchObject({ payload: { isoline: 0, levels: [{ lo: 10, hi: 20 }] } });
  });

  it("applies known colormaps and warns about others", async () => {
    const surface = await openSurface();
    const a = await attached(surface);
    const b = await attached(surface);
    a.clear();
    b.clear();

    surface.handleMessage(a, JSON.stringify({ topic: "colormap/set", payload: { name: "jet" } }));
    await surface.idle();
    expect(a.messages("notice")).toEqual([
      { topic: "notice", payload: { level: "warning", text: 'unknown colormap "jet"' } },
    ]);
    expect(b.received).toEqual([]);

    a.clear();
    surface.handleMessage(a, JSON.stringify({ topic: "colormap/set", payload: { name: "inferno" } }));
    await surface.idle();
    expect(a.kinds()).toEqual(["state", "frame"]);
    expect(b.kinds()).toEqual(["state", "frame"]);
    expect(surface.state.colormap).toBe("inferno");
    expect(Array.from(a.lastFrame().data.subarray(8, 12))).toEqual([0, 0, 4, 255]);
  });

  it("drops malformed messages", async () => {
    const surface = await openSurface();
    const page = await attached(surface);
    page.clear();

    surface.handleMessage(page, "{not json");
    surface.handleMessage(page, JSON.stringify({ topic: "pointer/move", payload: { x: 1 } }));
    await surface.idle();

    expect(page.received).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it("refreshes frames and resting status lines after a reload", async () => {
    const surface = await openSurface();
    const a = await attached(surface);
    const b = await attached(surface);
    surface.handleMessage(a, JSON.stringify({ topic: "pointer/move", payload: { x: 0.5, y: 0.5 } }));
    await surface.idle();
    a.clear();
    b.clear();

    next = () => loaded([[50, 60], [70, 80]]);
    surface.notifyFileChange("mem");
    await surface.idle();

    expect(a.kinds()).toEqual(["state", "frame", "status"]);
    expect(a.messages("status")).toEqual([
      { topic: "status", payload: { text: "pos: (0.5, 0.5)  pixel: (0, 0)  value: 70" } },
    ]);
    expect(a.lastFrame().info.revision).toBe(1);
    expect(b.kinds()).toEqual(["state", "frame"]);
  });

  it("keeps the last image when a reload fails and says when it recovers", async () => {
    const surface = await openSurface();
    const page = await attached(surface);
    page.clear();

    next = () => {
      throw new DecodeError("mem", "truncated raster: 1 of 4 samples");
    };
    surface.notifyFileChange("mem");
    await surface.idle();
    expect(page.received).toEqual([
      {
        kind: "text",
        message: { topic: "notice", payload: { level: "warning", text: "reload failed: mem: truncated raster: 1 of 4 samples" } },
      },
    ]);
    expect(surface.state.revision).toBe(0);

    page.clear();
    next = () => loaded([[1, 2], [3, 4]]);
    surface.notifyFileChange("mem");
    await surface.idle();
    expect(page.kinds()).toEqual(["state", "frame", "notice"]);
    expect(page.messages("notice")).toEqual([{ topic: "notice", payload: { level: "info", text: "reloaded mem" } }]);

    page.clear();
    surface.notifyFileChange("mem");
    await surface.idle();
    expect(page.kinds()).toEqual(["state", "frame"]);
  });

  it("handles events in the order they were posted", async () => {
    const surface = await openSurface();
    const page = await attached(surface);
    page.clear();

    next = () => loaded([[50, 60], [70, 80]]);
    surface.handleMessage(page, JSON.stringify({ topic: "pointer/move", payload: { x: 0.5, y: 0.5 } }));
    surface.notifyFileChange("mem");
    surface.handleMessage(page, JSON.stringify({ topic: "pointer/move", payload: { x: 1.5, y: 0.5 } }));
    await surface.idle();

    expect(page.messages("status")).toEqual([
      { topic: "status", payload: { text: "pos: (0.5, 0.5)  pixel: (0, 0)  value: 30" } },
      { topic: "status", payload: { text: "pos: (0.5, 0.5)  pixel: (0, 0)  value: 70" } },
      { topic: "status", payload: { text: "pos: (1.5, 0.5)  pixel: (0, 1)  value: 80" } },
    ]);
  });

  it("produces the same frame on repeated redraws", async () => {
    const surface = await openSurface();
    const page = await attached(surface);
    page.clear();

    surface.redraw();
    surface.redraw();
    const frames = page.received.flatMap((r) => (r.kind === "frame" ? [Array.from(r.frame.data)] : []));
    expect(frames).toHaveLength(2);
    expect(frames[1]).toEqual(frames[0]);
  });

  it("stops sending to detached pages", async () => {
    const surface = await openSurface();
    const page = await attached(surface);
    page.clear();

    surface.detach(page);
    surface.handleMessage(page, JSON.stringify({ topic: "pointer/move", payload: { x: 0, y: 0 } }));
    surface.notifyFileChange("mem");
    await surface.idle();

    expect(page.received).toEqual([]);
    expect(surface.pageCount).toBe(0);
  });
});

describe("RenderSurface with a watched file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "imview-surface-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("updates the status line when the file is rewritten", async () => {
    const path = join(dir, "img.ppm");
    await writeFile(path, "P2\n2 2\n255\n10 20\n30 40\n");
    const store = await ImageStore.open(path);
    const surface = new RenderSurface(store);
    const monitor = await FileChangeMonitor.watch(path, surface.notifyFileChange, {
      debounceMs: 10,
      stabilityMs: 50,
      pollMs: 10,
    });

    try {
      const page = await attached(surface);
      surface.handleMessage(page, JSON.stringify({ topic: "pointer/move", payload: { x: 0.5, y: 0.5 } }));
      await surface.idle();
      expect(page.messages("status").at(-1)).toEqual({
        topic: "status",
        payload: { text: "pos: (0.5, 0.5)  pixel: (0, 0)  value: 30" },
      });

      await writeFile(path, "P2\n2 2\n255\n50 60\n70 80\n");
      await vi.waitFor(
        () => {
          expect(page.messages("status").at(-1)).toEqual({
            topic: "status",
            payload: { text: "pos: (0.5, 0.5)  pixel: (0, 0)  value: 70" },
          });
        },
        { timeout: 4000, interval: 20 },
      );
    } finally {
      await monitor.close();
      await surface.idle();
    }
  });
});
