/**
 * Image Store: loads the watched file and swaps the current buffer.
 */

import type { ImageBuffer } from "../js/core/image";
import { formatDuration } from "../js/core/format";
import { readImageFile } from "./decode";
import { DecodeError, errorMessage } from "./errors";
import { ViewerState, type ViewerStateOptions } from "./state";

export type ReloadResult =
  | { ok: true; image: ImageBuffer; revision: number }
  | { ok: false; error: DecodeError };

export type StoreListener = (image: ImageBuffer, revision: number) => void;

export type ImageReader = (path: string) => Promise<ImageBuffer>;

export interface ImageStoreOptions extends ViewerStateOptions {
  /** Decoder, replaceable in tests. */
  read?: ImageReader;
}

export class ImageStore {
  private listeners = new Set<StoreListener>();
  private chain: Promise<unknown> = Promise.resolve();

  private constructor(
    readonly state: ViewerState,
    private readonly read: ImageReader,
  ) {}

  /**
   * Load the initial image and create the viewer state around it.
   * @throws DecodeError when the file cannot be loaded
   */
  static async open(path: string, options: ImageStoreOptions = {}): Promise<ImageStore> {
    const read = options.read ?? readImageFile;
    console.log(`[ImageStore] loading: ${path}`);
    const image = await read(path);
    return new ImageStore(new ViewerState(path, image, options), read);
  }

  get current(): ImageBuffer {
    return this.state.image;
  }

  /**
   * Read and decode `path`, then make it the current buffer.
   * Runs on the same queue as `reload`.
   * @throws DecodeError when the file cannot be loaded; the current buffer is kept
   */
  load(path: string = this.state.path): Promise<ImageBuffer> {
    return this.enqueue(async () => {
      const image = await this.read(path);
      this.publish(image);
      return image;
    });
  }

  /**
   * Reload the watched file. Failures are reported in the result and leave
   * the current buffer in place. Reloads run one after another in call order.
   */
  reload(path: string = this.state.path): Promise<ReloadResult> {
    return this.enqueue(() => this.reloadNow(path));
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const task = this.chain.then(work);
    // A failure reaches the caller through `task`; later work still runs
    this.chain = task.catch(() => undefined);
    return task;
  }

  private async reloadNow(path: string): Promise<ReloadResult> {
    console.log(`[ImageStore] reloading file: ${path}`);
    const started = performance.now();
    let image: ImageBuffer;
    try {
      image = await this.read(path);
    } catch (error) {
      const decodeError = error instanceof DecodeError ? error : new DecodeError(path, errorMessage(error), { cause: error });
      console.warn(`[ImageStore] reload failed, keeping revision ${this.state.revision}: ${decodeError.message}`);
      return { ok: false, error: decodeError };
    }

    const revision = this.publish(image);
    console.log(`[ImageStore] revision ${revision} ready in ${formatDuration((performance.now() - started) / 1000)}`);
    return { ok: true, image, revision };
  }

  private publish(image: ImageBuffer): number {
    const revision = this.state.replaceImage(image);
    for (const listener of this.listeners) {
      listener(image, revision);
    }
    return revision;
  }

  /**
   * Listen for buffer swaps.
   * @returns Unsubscribe function
   */
  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
