import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WatchError } from "./errors";
import { FileChangeMonitor, type WatchCallbacks, type WatchSettings, type WatcherFactory } from "./monitor";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

class FakeWatcher {
  callbacks: WatchCallbacks | null = null;
  settings: WatchSettings | null = null;
  closed = false;

  readonly factory: WatcherFactory = (_path, settings, callbacks) => {
    this.settings = settings;
    this.callbacks = callbacks;
    return {
      close: async () => {
        this.closed = true;
      },
    };
  };

  emit(kind: string): void {
    this.callbacks?.onEvent(kind);
  }
}

let dir: string;
let path: string;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  dir = await mkdtemp(join(tmpdir(), "imview-monitor-"));
  path = join(dir, "latest.ppm");
  await writeFile(path, "P2\n1 1\n255\n0\n");
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe("FileChangeMonitor", () => {
  it("coalesces a burst of events into one change", async () => {
    const fake = new FakeWatcher();
    const onChange = vi.fn();
    const monitor = await FileChangeMonitor.watch(path, onChange, { debounceMs: 20, watcher: fake.factory });

    fake.emit("change");
    fake.emit("change");
    fake.emit("change");
    expect(onChange).not.toHaveBeenCalled();
    await sleep(60);
    expect(onChange).toHaveBeenCalledTimes(1);
    expect(onChange).toHaveBeenCalledWith(path);
    await monitor.close();
  });

  it("treats removal and re-creation as changes", async () => {
    const fake = new FakeWatcher();
    const onChange = vi.fn();
    const monitor = await FileChangeMonitor.watch(path, onChange, { debounceMs: 10, watcher: fake.factory });

    fake.emit("unlink");
    await sleep(40);
    fake.emit("add");
    await sleep(40);
    expect(onChange).toHaveBeenCalledTimes(2);
    await monitor.close();
  });

  it("ignores events that do not touch the file's content", async () => {
    const fake = new FakeWatcher();
    const onChange = vi.fn();
    const monitor = await FileChangeMonitor.watch(path, onChange, { debounceMs: 10, watcher: fake.factory });

    fake.emit("addDir");
    fake.emit("unlinkDir");
    fake.emit("raw");
    await sleep(40);
    expect(onChange).not.toHaveBeenCalled();
    await monitor.close();
  });

  it("drops a pending change on close", async () => {
    const fake = new FakeWatcher();
    const onChange = vi.fn();
    const monitor = await FileChangeMonitor.watch(path, onChange, { debounceMs: 20, watcher: fake.factory });

    fake.emit("change");
    await monitor.close();
    await sleep(60);
    expect(onChange).not.toHaveBeenCalled();
    expect(fake.closed).toBe(true);
  });

  it("passes write-settling settings to the watcher", async () => {
    const fake = new FakeWatcher();
    const monitor = await FileChangeMonitor.watch(path, vi.fn(), { watcher: fake.factory });
    expect(fake.settings).toEqual({ stabilityMs: 100, pollMs: 25 });
    await monitor.close();

    const tuned = await FileChangeMonitor.watch(path, vi.fn(), { watcher: fake.factory, stabilityMs: 10, pollMs: 5 });
    expect(fake.settings).toEqual({ stabilityMs: 10, pollMs: 5 });
    await tuned.close();
  });

  it("fails with a WatchError for a missing path", async () => {
    const missing = join(dir, "missing.ppm");
    const error = await FileChangeMonitor.watch(missing, vi.fn(), { watcher: new FakeWatcher().factory }).then(
      () => null,
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(WatchError);
    expect(error).toMatchObject({ code: "WATCH", path: missing });
  });

  it("fails with a WatchError when the watcher cannot start", async () => {
    const broken: WatcherFactory = () => {
      throw new Error("too many watchers");
    };
    await expect(FileChangeMonitor.watch(path, vi.fn(), { watcher: broken })).rejects.toThrow(
      `cannot watch ${path}: too many watchers`,
    );
  });
});

describe("FileChangeMonitor with chokidar", () => {
  it("reports a rewrite of the watched file", async () => {
    const onChange = vi.fn();
    const monitor = await FileChangeMonitor.watch(path, onChange, { debounceMs: 10, stabilityMs: 50, pollMs: 10 });
    try {
      await writeFile(path, "P2\n1 1\n255\n9\n");
      await vi.waitFor(() => expect(onChange).toHaveBeenCalledWith(path), { timeout: 4000, interval: 20 });
    } finally {
      await monitor.close();
    }
  });
});
