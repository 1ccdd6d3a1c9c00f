/**
 * Render Surface: owns the viewer's event queue, tone maps the current
 * buffer into frames and pushes frames and state to every connected page.
 */

import { isColormapName } from "../js/core/colormaps";
import type { DisplayPos } from "../js/core/coordinates";
import { PixelInspector } from "../js/core/inspector";
import { renderRGBA } from "../js/core/levels";
import { encodeFrame, parseClientMessage, type NoticeLevel, type ServerMessage } from "../js/core/protocol";
import { errorMessage } from "./errors";
import { EventQueue } from "./queue";
import type { ViewerState } from "./state";
import type { ImageStore } from "./store";

/** One connected page, as seen by the surface. */
export interface PageConnection {
  sendText(text: string): void;
  sendBinary(data: Uint8Array): void;
}

export type ViewerEvent =
  | { type: "page-attached"; page: PageConnection }
  | { type: "pointer-move"; page: PageConnection; pos: DisplayPos }
  | { type: "pointer-exit"; page: PageConnection }
  | { type: "file-change"; path: string }
  | { type: "set-levels"; lo: number; hi: number; channel?: number }
  | { type: "reset-levels" }
  | { type: "set-isoline"; value: number }
  | { type: "set-colormap"; page: PageConnection; name: string };

interface PageSession {
  inspector: PixelInspector;
  /** Last pointer position over the image, null after an exit. */
  pointer: DisplayPos | null;
}

export class RenderSurface {
  private readonly queue: EventQueue<ViewerEvent>;
  private readonly pages = new Map<PageConnection, PageSession>();
  private frame: Uint8Array | null = null;
  private lastReloadFailed = false;

  constructor(private readonly store: ImageStore) {
    this.queue = new EventQueue<ViewerEvent>(
      (event) => this.dispatch(event),
      (error, event) => console.error(`[RenderSurface] ${event.type} handler failed:`, error),
    );
  }

  get state(): ViewerState {
    return this.store.state;
  }

  get pageCount(): number {
    return this.pages.size;
  }

  post(event: ViewerEvent): void {
    this.queue.post(event);
  }

  /** Resolves once every event posted so far has been handled. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  /** Change callback for the File Change Monitor. */
  readonly notifyFileChange = (path: string): void => {
    this.post({ type: "file-change", path });
  };

  attach(page: PageConnection): void {
    this.pages.set(page, { inspector: new PixelInspector(this.store.state), pointer: null });
    this.post({ type: "page-attached", page });
  }

  detach(page: PageConnection): void {
    this.pages.delete(page);
  }

  /** Route one text message from a page. Malformed messages are dropped. */
  handleMessage(page: PageConnection, raw: string): void {
    const message = parseClientMessage(raw);
    if (!message) {
      console.warn(`[RenderSurface] dropping malformed message: ${raw.slice(0, 80)}`);
      return;
    }
    switch (message.topic) {
      case "pointer/move":
        this.post({ type: "pointer-move", page, pos: message.payload });
        break;
      case "pointer/exit":
        this.post({ type: "pointer-exit", page });
        break;
      case "levels/set":
        this.post({ type: "set-levels", ...message.payload });
        break;
      case "levels/reset":
        this.post({ type: "reset-levels" });
        break;
      case "isoline/set":
        this.post({ type: "set-isoline", value: message.payload.value });
        break;
      case "colormap/set":
        this.post({ type: "set-colormap", page, name: message.payload.name });
        break;
    }
  }

  /**
   * Tone map the current buffer and send the frame to every page.
   * Safe to call any number of times.
   */
  redraw(): void {
    const { image, levels, colormap, revision } = this.state;
    const rgba = renderRGBA(image, levels.levelRanges, colormap);
    this.frame = encodeFrame({ width: image.width, height: image.height, revision }, rgba);
    for (const page of this.pages.keys()) {
      page.sendBinary(this.frame);
    }
  }

  private async dispatch(event: ViewerEvent): Promise<void> {
    switch (event.type) {
      case "page-attached": {
        if (!this.pages.has(event.page)) return;
        this.send(event.page, { topic: "state", payload: this.state.snapshot() });
        if (!this.frame) this.redraw();
        else event.page.sendBinary(this.frame);
        return;
      }
      case "pointer-move": {
        const session = this.pages.get(event.page);
        if (!session) return;
        session.pointer = event.pos;
        this.send(event.page, { topic: "status", payload: { text: session.inspector.onPointerMove(event.pos) } });
        return;
      }
      case "pointer-exit": {
        const session = this.pages.get(event.page);
        if (!session) return;
        session.pointer = null;
        this.send(event.page, { topic: "status", payload: { text: session.inspector.onPointerExit() } });
        return;
      }
      case "file-change":
        await this.reload();
        return;
      case "set-levels":
        this.state.levels.setLevelRange(event.lo, event.hi, event.channel);
        this.refresh();
        return;
      case "reset-levels":
        this.state.levels.resetLevels(this.state.image);
        this.refresh();
        return;
      case "set-isoline":
        this.state.levels.setIsolineValue(event.value);
        this.broadcast({ topic: "isoline", payload: { value: this.state.levels.isolineValue } });
        return;
      case "set-colormap":
        if (!isColormapName(event.name)) {
          this.notice("warning", `unknown colormap "${event.name}"`, event.page);
          return;
        }
        this.state.colormap = event.name;
        this.refresh();
        return;
    }
  }

  private async reload(): Promise<void> {
    const result = await this.store.reload();
    if (!result.ok) {
      this.lastReloadFailed = true;
      this.notice("warning", `reload failed: ${errorMessage(result.error)}`);
      return;
    }
    this.refresh();
    // Status lines follow the new content under a resting cursor
    for (const [page, session] of this.pages) {
      if (session.pointer) {
        this.send(page, { topic: "status", payload: { text: session.inspector.onPointerMove(session.pointer) } });
      }
    }
    if (this.lastReloadFailed) {
      this.lastReloadFailed = false;
      this.notice("info", `reloaded ${this.state.path}`);
    }
  }

  /** Push new state, then a new frame. */
  private refresh(): void {
    this.broadcast({ topic: "state", payload: this.state.snapshot() });
    this.redraw();
  }

  private notice(level: NoticeLevel, text: string, page?: PageConnection): void {
    const message: ServerMessage = { topic: "notice", payload: { level, text } };
    if (page) this.send(page, message);
    else this.broadcast(message);
  }

  private send(page: PageConnection, message: ServerMessage): void {
    page.sendText(JSON.stringify(message));
  }

  private broadcast(message: ServerMessage): void {
    const text = JSON.stringify(message);
    for (const page of this.pages.keys()) {
      page.sendText(text);
    }
  }
}
