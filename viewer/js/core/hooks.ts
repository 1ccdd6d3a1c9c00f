/**
 * Shared React hooks for the viewer page.
 * Provides zoom/pan, wheel capture and the host connection.
 */

import * as React from "react";
import { ViewerClient } from "../client";
import type { ClientMessage, Frame, NoticeLevel, ViewerSnapshot } from "./protocol";

// ============================================================================
// Constants
// ============================================================================
export const ZOOM_LIMITS = {
  MIN: 0.5,
  MAX: 40,
  WHEEL_IN: 1.1,
  WHEEL_OUT: 0.9,
} as const;

// ============================================================================
// Types
// ============================================================================
export interface ZoomPanState {
  zoom: number;
  panX: number;
  panY: number;
}

export const DEFAULT_ZOOM_PAN: ZoomPanState = {
  zoom: 1,
  panX: 0,
  panY: 0,
};

// ============================================================================
// useZoomPan Hook
// ============================================================================
export interface UseZoomPanOptions {
  canvasRef: React.RefObject<HTMLCanvasElement>;
  /** State that `reset` returns to, e.g. the image centered at zoom 1. */
  initialState?: ZoomPanState;
}

export interface UseZoomPanResult {
  state: ZoomPanState;
  setState: React.Dispatch<React.SetStateAction<ZoomPanState>>;
  reset: () => void;
  handleWheel: (e: React.WheelEvent) => void;
  handleMouseDown: (e: React.MouseEvent) => void;
  handleMouseMove: (e: React.MouseEvent) => void;
  handleMouseUp: () => void;
  handleDoubleClick: () => void;
  isDragging: boolean;
}

/** Pointer position in CSS pixels relative to the canvas' top-left corner. */
export function canvasPoint(canvas: HTMLCanvasElement, clientX: number, clientY: number): { x: number; y: number } {
  const rect = canvas.getBoundingClientRect();
  return { x: clientX - rect.left, y: clientY - rect.top };
}

/**
 * Zoom about the cursor and drag to pan. Pan is the canvas position of the
 * image's top-left corner, in CSS pixels.
 */
export function useZoomPan(options: UseZoomPanOptions): UseZoomPanResult {
  const { canvasRef, initialState = DEFAULT_ZOOM_PAN } = options;

  const [state, setState] = React.useState<ZoomPanState>(initialState);
  const [isDragging, setIsDragging] = React.useState(false);
  const [dragStart, setDragStart] = React.useState<{ x: number; y: number; panX: number; panY: number } | null>(null);

  const initialRef = React.useRef(initialState);
  initialRef.current = initialState;

  const reset = React.useCallback(() => {
    setState(initialRef.current);
  }, []);

  const handleWheel = React.useCallback((e: React.WheelEvent) => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const mouse = canvasPoint(canvas, e.clientX, e.clientY);

    setState(prev => {
      const zoomFactor = e.deltaY > 0 ? ZOOM_LIMITS.WHEEL_OUT : ZOOM_LIMITS.WHEEL_IN;
      const newZoom = Math.max(ZOOM_LIMITS.MIN, Math.min(ZOOM_LIMITS.MAX, prev.zoom * zoomFactor));
      const ratio = newZoom / prev.zoom;

      // Keep the image point under the cursor fixed
      return {
        zoom: newZoom,
        panX: mouse.x - (mouse.x - prev.panX) * ratio,
        panY: mouse.y - (mouse.y - prev.panY) * ratio,
      };
    });
  }, [canvasRef]);

  const handleMouseDown = React.useCallback((e: React.MouseEvent) => {
    setIsDragging(true);
    setDragStart({ x: e.clientX, y: e.clientY, panX: state.panX, panY: state.panY });
  }, [state.panX, state.panY]);

  const handleMouseMove = React.useCallback((e: React.MouseEvent) => {
    if (!isDragging || !dragStart) return;
    const dx = e.clientX - dragStart.x;
    const dy = e.clientY - dragStart.y;
    setState(prev => ({ ...prev, panX: dragStart.panX + dx, panY: dragStart.panY + dy }));
  }, [isDragging, dragStart]);

  const handleMouseUp = React.useCallback(() => {
    setIsDragging(false);
    setDragStart(null);
  }, []);

  const handleDoubleClick = React.useCallback(() => {
    reset();
  }, [reset]);

  return {
    state,
    setState,
    reset,
    handleWheel,
    handleMouseDown,
    handleMouseMove,
    handleMouseUp,
    handleDoubleClick,
    isDragging,
  };
}

// ============================================================================
// usePreventScroll Hook
// ============================================================================
export function usePreventScroll(refs: React.RefObject<HTMLElement | null>[]): void {
  React.useEffect(() => {
    const preventDefault = (e: WheelEvent) => e.preventDefault();
    const elements = refs
      .map(ref => ref.current)
      .filter((el): el is HTMLElement => el !== null);

    elements.forEach(el => el.addEventListener("wheel", preventDefault, { passive: false }));

    return () => {
      elements.forEach(el => el.removeEventListener("wheel", preventDefault));
    };
  }, [refs]);
}

// ============================================================================
// useViewerConnection Hook
// ============================================================================
export interface Notice {
  level: NoticeLevel;
  text: string;
}

export interface UseViewerConnectionResult {
  connected: boolean;
  snapshot: ViewerSnapshot | null;
  frame: Frame | null;
  status: string;
  isoline: number | null;
  notice: Notice | null;
  send: (message: ClientMessage) => void;
  dismissNotice: () => void;
}

/**
 * Connect to the viewer host for the component's lifetime and mirror
 * everything it pushes into React state.
 */
export function useViewerConnection(url: string): UseViewerConnectionResult {
  const clientRef = React.useRef<ViewerClient | null>(null);
  const [connected, setConnected] = React.useState(false);
  const [snapshot, setSnapshot] = React.useState<ViewerSnapshot | null>(null);
  const [frame, setFrame] = React.useState<Frame | null>(null);
  const [status, setStatus] = React.useState("");
  const [isoline, setIsoline] = React.useState<number | null>(null);
  const [notice, setNotice] = React.useState<Notice | null>(null);

  React.useEffect(() => {
    const client = new ViewerClient(url);
    clientRef.current = client;

    client.onConnectionChange(setConnected);
    client.onFrame(setFrame);
    client.on("state", (payload) => {
      setSnapshot(payload);
      setIsoline(payload.isoline);
    });
    client.on("status", (payload) => setStatus(payload.text));
    client.on("isoline", (payload) => setIsoline(payload.value));
    client.on("notice", (payload) => setNotice(payload));

    client.connect().catch((error) => {
      console.error("[useViewerConnection] Initial connection failed:", error);
    });

    return () => {
      client.destroy();
      clientRef.current = null;
    };
  }, [url]);

  const send = React.useCallback((message: ClientMessage) => {
    clientRef.current?.send(message);
  }, []);

  const dismissNotice = React.useCallback(() => setNotice(null), []);

  return { connected, snapshot, frame, status, isoline, notice, send, dismissNotice };
}
