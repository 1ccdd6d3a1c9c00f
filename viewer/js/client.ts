/**
 * WebSocket client for the viewer host.
 * JSON messages are routed by topic; binary messages are frames.
 */

import { isColormapName } from "./core/colormaps";
import { isChannelCount } from "./core/image";
import { decodeFrame, type ClientMessage, type Frame, type ServerMessage, type ViewerSnapshot } from "./core/protocol";

type Topic = ServerMessage["topic"];
type PayloadOf<T extends Topic> = Extract<ServerMessage, { topic: T }>["payload"];
type HandlerSets = { [T in Topic]: Set<(payload: PayloadOf<T>) => void> };

function emit<P>(handlers: Set<(payload: P) => void>, payload: P): void {
  for (const handler of handlers) {
    handler(payload);
  }
}

export type ConnectionHandler = (connected: boolean) => void;
export type FrameHandler = (frame: Frame) => void;

interface ViewerClientOptions {
  autoReconnect?: boolean;
  initialReconnectDelayMs?: number;
  maxReconnectDelayMs?: number;
  maxReconnectAttempts?: number;
}

const DEFAULT_OPTIONS: Required<ViewerClientOptions> = {
  autoReconnect: true,
  initialReconnectDelayMs: 1000,
  maxReconnectDelayMs: 15000,
  maxReconnectAttempts: 10,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLevelRange(value: unknown): boolean {
  return isRecord(value) && typeof value.lo === "number" && typeof value.hi === "number";
}

function isSnapshot(value: Record<string, unknown>): value is Record<string, unknown> & ViewerSnapshot {
  const { histogram, levels, defaultLevels, colormap, channelCount } = value;
  return (
    typeof value.title === "string" &&
    typeof value.path === "string" &&
    typeof value.width === "number" &&
    typeof value.height === "number" &&
    typeof value.revision === "number" &&
    typeof value.isoline === "number" &&
    typeof value.pinned === "boolean" &&
    typeof value.watching === "boolean" &&
    typeof channelCount === "number" &&
    isChannelCount(channelCount) &&
    typeof colormap === "string" &&
    isColormapName(colormap) &&
    Array.isArray(levels) &&
    levels.every(isLevelRange) &&
    Array.isArray(defaultLevels) &&
    defaultLevels.every(isLevelRange) &&
    isRecord(histogram) &&
    Array.isArray(histogram.channels)
  );
}

/** Parse and check a host message; null for unknown topics or shapes. */
function parseServerMessage(text: string): ServerMessage | null {
  const value: unknown = JSON.parse(text);
  if (!isRecord(value) || !isRecord(value.payload)) return null;
  const payload = value.payload;
  switch (value.topic) {
    case "state":
      return isSnapshot(payload) ? { topic: "state", payload } : null;
    case "status":
      return typeof payload.text === "string" ? { topic: "status", payload: { text: payload.text } } : null;
    case "isoline":
      return typeof payload.value === "number" ? { topic: "isoline", payload: { value: payload.value } } : null;
    case "notice": {
      const { level, text: notice } = payload;
      if (typeof notice !== "string") return null;
      if (level === "info" || level === "warning") return { topic: "notice", payload: { level, text: notice } };
      return null;
    }
    default:
      return null;
  }
}

/** Default socket URL for the page's own origin. */
export function defaultSocketUrl(location: Pick<Location, "protocol" | "host">, path: string = "/ws"): string {
  const protocol = location.protocol === "https:" ? "wss:" : "ws:";
  return `${protocol}//${location.host}${path}`;
}

export class ViewerClient {
  private ws: WebSocket | null = null;
  private handlers: HandlerSets = { state: new Set(), status: new Set(), isoline: new Set(), notice: new Set() };
  private frameHandlers = new Set<FrameHandler>();
  private connectionHandlers = new Set<ConnectionHandler>();
  private reconnectAttempts = 0;
  private reconnectDelay: number;
  private reconnectTimer: number | null = null;
  private shouldReconnect: boolean;
  private readonly initialReconnectDelay: number;
  private readonly maxReconnectDelay: number;
  private readonly maxReconnectAttempts: number;

  constructor(
    private url: string,
    options: ViewerClientOptions = {},
  ) {
    const resolved = { ...DEFAULT_OPTIONS, ...options };
    this.shouldReconnect = resolved.autoReconnect;
    this.initialReconnectDelay = resolved.initialReconnectDelayMs;
    this.reconnectDelay = resolved.initialReconnectDelayMs;
    this.maxReconnectDelay = resolved.maxReconnectDelayMs;
    this.maxReconnectAttempts = resolved.maxReconnectAttempts;
  }

  /**
   * Connect to the host.
   */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.cleanupSocket();
      const ws = new WebSocket(this.url);
      ws.binaryType = "arraybuffer";
      this.ws = ws;

      ws.onopen = () => {
        console.log("[ViewerClient] Connected");
        this.reconnectAttempts = 0;
        this.reconnectDelay = this.initialReconnectDelay;
        this.notifyConnectionChange(true);
        resolve();
      };

      ws.onmessage = (event: MessageEvent<string | ArrayBuffer>) => {
        try {
          this.handleMessage(event.data);
        } catch (error) {
          console.error("[ViewerClient] Error processing message:", error);
        }
      };

      ws.onerror = (event) => {
        console.error("[ViewerClient] WebSocket error:", event);
        reject(new Error("WebSocket connection error"));
      };

      ws.onclose = (event) => {
        console.log("[ViewerClient] Connection closed:", event.code, event.reason);
        this.notifyConnectionChange(false);
        if (this.shouldReconnect) {
          this.scheduleReconnect();
        }
      };
    });
  }

  /**
   * Disconnect and stop reconnecting.
   */
  disconnect(): void {
    this.shouldReconnect = false;
    this.clearReconnectTimer();
    this.cleanupSocket();
    this.notifyConnectionChange(false);
  }

  /**
   * Subscribe to one host topic.
   * @returns Unsubscribe function
   */
  on<T extends Topic>(topic: T, handler: (payload: PayloadOf<T>) => void): () => void {
    const set: Set<(payload: PayloadOf<T>) => void> = this.handlers[topic];
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  onFrame(handler: FrameHandler): () => void {
    this.frameHandlers.add(handler);
    return () => this.frameHandlers.delete(handler);
  }

  onConnectionChange(handler: ConnectionHandler): () => void {
    this.connectionHandlers.add(handler);
    return () => this.connectionHandlers.delete(handler);
  }

  /**
   * Send a message to the host. Dropped while disconnected.
   */
  send(message: ClientMessage): void {
    if (this.ws?.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(message));
    }
  }

  get isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  private handleMessage(data: string | ArrayBuffer): void {
    if (typeof data === "string") {
      const message = parseServerMessage(data);
      if (!message) {
        console.warn("[ViewerClient] Ignoring unknown message");
        return;
      }
      this.dispatch(message);
      return;
    }

    const frame = decodeFrame(new Uint8Array(data));
    if (!frame) {
      console.error("[ViewerClient] Invalid frame");
      return;
    }
    this.frameHandlers.forEach((h) => h(frame));
  }

  private dispatch(message: ServerMessage): void {
    switch (message.topic) {
      case "state":
        return emit(this.handlers.state, message.payload);
      case "status":
        return emit(this.handlers.status, message.payload);
      case "isoline":
        return emit(this.handlers.isoline, message.payload);
      case "notice":
        return emit(this.handlers.notice, message.payload);
    }
  }

  private notifyConnectionChange(connected: boolean): void {
    for (const h of this.connectionHandlers) {
      h(connected);
    }
  }

  private scheduleReconnect(): void {
    if (!this.shouldReconnect || this.reconnectTimer) {
      return;
    }

    if (this.reconnectAttempts >= this.maxReconnectAttempts) {
      console.error("[ViewerClient] Max reconnection attempts reached");
      return;
    }

    this.reconnectAttempts++;
    console.log(`[ViewerClient] Reconnecting... attempt ${this.reconnectAttempts} in ${this.reconnectDelay}ms`);

    this.reconnectTimer = window.setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnectDelay = Math.min(this.reconnectDelay * 1.5, this.maxReconnectDelay);
      this.connect().catch((error) => {
        console.error("[ViewerClient] Reconnection failed:", error);
      });
    }, this.reconnectDelay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private cleanupSocket(): void {
    if (this.ws) {
      this.ws.onopen = null;
      this.ws.onclose = null;
      this.ws.onerror = null;
      this.ws.onmessage = null;
      this.ws.close();
      this.ws = null;
    }
  }

  /**
   * Clean up all resources.
   */
  destroy(): void {
    this.disconnect();
    for (const set of Object.values(this.handlers)) {
      set.clear();
    }
    this.frameHandlers.clear();
    this.connectionHandlers.clear();
  }
}
