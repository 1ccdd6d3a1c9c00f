/**
 * File Change Monitor: watches one path and reports content changes.
 * It only calls the `onChange` callback it was given; the viewer passes a
 * callback that posts onto the render surface's event queue.
 */

import { access, constants } from "node:fs/promises";
import { watch } from "chokidar";
import type { DebouncedFunc } from "lodash";
import debounce from "lodash/debounce";
import { WATCH } from "../js/CONFIG";
import { WatchError, errorMessage } from "./errors";

export interface WatchCallbacks {
  onEvent: (kind: string) => void;
  onError: (error: Error) => void;
}

export interface WatchHandle {
  close(): Promise<void>;
  /** Settles once the watcher sees changes. */
  ready?: Promise<void>;
}

export interface WatchSettings {
  stabilityMs: number;
  pollMs: number;
}

export type WatcherFactory = (path: string, settings: WatchSettings, callbacks: WatchCallbacks) => WatchHandle;

/** Watch with chokidar, reporting a write only once the file size settles. */
export const chokidarWatcher: WatcherFactory = (path, settings, callbacks) => {
  const watcher = watch(path, {
    ignoreInitial: true,
    persistent: true,
    awaitWriteFinish: {
      stabilityThreshold: settings.stabilityMs,
      pollInterval: settings.pollMs,
    },
  });
  const ready = new Promise<void>((resolve) => {
    watcher.once("ready", () => resolve());
  });
  watcher.on("all", (eventName) => callbacks.onEvent(eventName));
  watcher.on("error", callbacks.onError);
  return { ready, close: () => watcher.close() };
};

export interface MonitorOptions {
  debounceMs?: number;
  stabilityMs?: number;
  pollMs?: number;
  watcher?: WatcherFactory;
}

/** Watcher events that mean the file's content may differ. */
const CONTENT_EVENTS = new Set(["add", "change", "unlink"]);

export class FileChangeMonitor {
  private readonly notify: DebouncedFunc<() => void>;
  private handle: WatchHandle | null = null;

  private constructor(
    readonly path: string,
    onChange: (path: string) => void,
    debounceMs: number,
  ) {
    this.notify = debounce(() => onChange(path), debounceMs);
  }

  /**
   * Start watching `path`. Renames and removals are reported as changes;
   * the reload that follows reports the missing file.
   * @throws WatchError when the path cannot be read or watched
   */
  static async watch(
    path: string,
    onChange: (path: string) => void,
    options: MonitorOptions = {},
  ): Promise<FileChangeMonitor> {
    try {
      await access(path, constants.R_OK);
    } catch (error) {
      throw new WatchError(path, errorMessage(error), { cause: error });
    }

    const monitor = new FileChangeMonitor(path, onChange, options.debounceMs ?? WATCH.DEBOUNCE_MS);
    const factory = options.watcher ?? chokidarWatcher;
    const settings: WatchSettings = {
      stabilityMs: options.stabilityMs ?? WATCH.STABILITY_MS,
      pollMs: options.pollMs ?? WATCH.POLL_MS,
    };

    try {
      monitor.handle = factory(path, settings, {
        onEvent: (kind) => {
          if (CONTENT_EVENTS.has(kind)) monitor.notify();
        },
        onError: (error) => {
          console.error(`[FileChangeMonitor] watcher error on ${path}:`, error);
        },
      });
    } catch (error) {
      throw new WatchError(path, errorMessage(error), { cause: error });
    }
    await monitor.handle.ready;
    console.log(`[FileChangeMonitor] watching ${path}`);
    return monitor;
  }

  /** Stop watching and drop any change still waiting out the debounce. */
  async close(): Promise<void> {
    this.notify.cancel();
    const handle = this.handle;
    this.handle = null;
    if (handle) await handle.close();
  }
}
