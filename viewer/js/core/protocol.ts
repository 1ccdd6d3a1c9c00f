/**
 * Messages exchanged between the viewer host and its pages.
 *
 * Text messages are JSON `{ topic, payload }`. Frames are binary:
 * a JSON envelope line, a newline, then a msgpack body `{ info, data }`
 * where `data` is RGBA bytes in buffer row order (bottom row first).
 */

import { pack, unpack } from "msgpackr";
import type { ColormapName } from "./colormaps";
import type { DisplayPos } from "./coordinates";
import type { HistogramData } from "./histogram";
import type { ChannelCount } from "./image";
import type { LevelRange } from "./levels";

// ============================================================================
// Page -> host
// ============================================================================
export type ClientMessage =
  | { topic: "pointer/move"; payload: DisplayPos }
  | { topic: "pointer/exit" }
  | { topic: "levels/set"; payload: { lo: number; hi: number; channel?: number } }
  | { topic: "levels/reset" }
  | { topic: "isoline/set"; payload: { value: number } }
  | { topic: "colormap/set"; payload: { name: string } };

// ============================================================================
// Host -> page
// ============================================================================
export interface ViewerSnapshot {
  title: string;
  path: string;
  width: number;
  height: number;
  channelCount: ChannelCount;
  revision: number;
  levels: LevelRange[];
  defaultLevels: LevelRange[];
  pinned: boolean;
  isoline: number;
  colormap: ColormapName;
  histogram: HistogramData;
  watching: boolean;
}

export type NoticeLevel = "info" | "warning";

export type ServerMessage =
  | { topic: "state"; payload: ViewerSnapshot }
  | { topic: "status"; payload: { text: string } }
  | { topic: "isoline"; payload: { value: number } }
  | { topic: "notice"; payload: { level: NoticeLevel; text: string } };

export interface FrameInfo {
  width: number;
  height: number;
  revision: number;
}

export interface Frame {
  topic: string;
  info: FrameInfo;
  data: Uint8Array;
}

export const FRAME_TOPIC = "frame";

const NEWLINE = 10;

// ============================================================================
// Narrowing helpers
// ============================================================================
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberField(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  return typeof value === "number" ? value : undefined;
}

/**
 * Parse and validate a page message. Returns null for anything that is not
 * a well-formed message. Numbers are not range-checked here.
 */
export function parseClientMessage(raw: string): ClientMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(value)) return null;
  const topic = value.topic;
  const rawPayload = value.payload;
  const payload: Record<string, unknown> = isRecord(rawPayload) ? rawPayload : {};

  switch (topic) {
    case "pointer/move": {
      const x = numberField(payload, "x");
      const y = numberField(payload, "y");
      return x === undefined || y === undefined ? null : { topic: "pointer/move", payload: { x, y } };
    }
    case "pointer/exit":
      return { topic: "pointer/exit" };
    case "levels/set": {
      const lo = numberField(payload, "lo");
      const hi = numberField(payload, "hi");
      if (lo === undefined || hi === undefined) return null;
      const channel = numberField(payload, "channel");
      return { topic: "levels/set", payload: channel === undefined ? { lo, hi } : { lo, hi, channel } };
    }
    case "levels/reset":
      return { topic: "levels/reset" };
    case "isoline/set": {
      const v = numberField(payload, "value");
      return v === undefined ? null : { topic: "isoline/set", payload: { value: v } };
    }
    case "colormap/set": {
      const name = payload.name;
      return typeof name === "string" ? { topic: "colormap/set", payload: { name } } : null;
    }
    default:
      return null;
  }
}

// ============================================================================
// Frames
// ============================================================================
export function encodeFrame(info: FrameInfo, rgba: Uint8Array | Uint8ClampedArray): Uint8Array {
  const envelope = new TextEncoder().encode(JSON.stringify({ topic: FRAME_TOPIC }) + "\n");
  const data = new Uint8Array(rgba.buffer, rgba.byteOffset, rgba.byteLength);
  const body = pack({ info, data });
  const out = new Uint8Array(envelope.length + body.length);
  out.set(envelope, 0);
  out.set(body, envelope.length);
  return out;
}

/** Decode a binary frame; null when the bytes are not a frame. */
export function decodeFrame(bytes: Uint8Array): Frame | null {
  const newlineIndex = bytes.indexOf(NEWLINE);
  if (newlineIndex === -1) return null;

  let envelope: unknown;
  let body: unknown;
  try {
    envelope = JSON.parse(new TextDecoder().decode(bytes.subarray(0, newlineIndex)));
    body = unpack(bytes.subarray(newlineIndex + 1));
  } catch {
    return null;
  }
  if (!isRecord(envelope) || !isRecord(body)) return null;
  const topic = envelope.topic;
  const info = body.info;
  const data = body.data;
  if (typeof topic !== "string" || !isRecord(info) || !(data instanceof Uint8Array)) return null;

  const width = numberField(info, "width");
  const height = numberField(info, "height");
  const revision = numberField(info, "revision");
  if (width === undefined || height === undefined || revision === undefined) return null;
  if (data.length !== width * height * 4) return null;

  return { topic, info: { width, height, revision }, data };
}
