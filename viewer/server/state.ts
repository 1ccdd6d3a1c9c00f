/**
 * The viewer's single owned state object. Components receive it by
 * reference; only the ImageStore replaces the current buffer.
 */

import { DEFAULT_COLORMAP, type ColormapName } from "../js/core/colormaps";
import type { ImageBuffer } from "../js/core/image";
import type { ImageSource } from "../js/core/inspector";
import { LevelController, type LevelOptions } from "../js/core/levels";
import type { ViewerSnapshot } from "../js/core/protocol";

export interface ViewerStateOptions {
  title?: string;
  colormap?: ColormapName;
  levels?: LevelOptions;
}

export class ViewerState implements ImageSource {
  readonly title: string;
  readonly levels: LevelController;
  colormap: ColormapName;
  /** False when the file could not be watched (static mode). */
  watching = false;

  private current: ImageBuffer;
  private rev = 0;

  constructor(
    readonly path: string,
    image: ImageBuffer,
    options: ViewerStateOptions = {},
  ) {
    this.title = options.title ?? path;
    this.colormap = options.colormap ?? DEFAULT_COLORMAP;
    this.current = image;
    this.levels = new LevelController(image, options.levels);
  }

  /** The current buffer. Never mutated; replaced as a whole. */
  get image(): ImageBuffer {
    return this.current;
  }

  /** Bumped on every buffer swap. */
  get revision(): number {
    return this.rev;
  }

  /**
   * Publish a new current buffer and update the level defaults for it.
   * Called by ImageStore only.
   */
  replaceImage(image: ImageBuffer): number {
    this.current = image;
    this.rev++;
    this.levels.onImageChanged(image);
    return this.rev;
  }

  snapshot(): ViewerSnapshot {
    const { image, levels } = this;
    return {
      title: this.title,
      path: this.path,
      width: image.width,
      height: image.height,
      channelCount: image.channelCount,
      revision: this.rev,
      levels: levels.levelRanges.map((r) => ({ ...r })),
      defaultLevels: levels.defaultRanges.map((r) => ({ ...r })),
      pinned: levels.isPinned,
      isoline: levels.isolineValue,
      colormap: this.colormap,
      histogram: levels.histogram,
      watching: this.watching,
    };
  }
}
