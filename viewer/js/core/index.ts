/**
 * Core utilities for the viewer.
 * Re-exports the modules shared by the page; the host imports modules directly.
 */

// Colors and theming
export { CHANNEL_COLORS, COLORS, colors } from "./colors";

// Colormaps
export {
  COLORMAP_NAMES,
  COLORMAPS,
  DEFAULT_COLORMAP,
  colormapGradient,
  isColormapName,
  type ColormapName,
} from "./colormaps";

// Canvas rendering
export {
  HISTOGRAM_PADDING,
  drawFrame,
  drawHistogram,
  drawIsoline,
  frameToCanvas,
  panelYToValue,
  prepareHiDPI,
  valueToPanelY,
} from "./canvas";

// Coordinates
export {
  canvasToDisplay,
  fitScale,
  mapToPixel,
  type DisplayPos,
  type ViewTransform,
} from "./coordinates";

// Formatting
export { clamp, formatSignificant } from "./format";

// Levels
export type { LevelRange } from "./levels";

// Wire protocol
export type { ClientMessage, Frame, ViewerSnapshot } from "./protocol";

// Outgoing message throttling
export { createThrottledSender, type ClientTopic, type ThrottledSender } from "./sender";

// Base CSS
export { baseCSS, injectBaseCSS } from "./styles";

// React hooks
export {
  DEFAULT_ZOOM_PAN,
  ZOOM_LIMITS,
  canvasPoint,
  usePreventScroll,
  useViewerConnection,
  useZoomPan,
  type Notice,
  type UseViewerConnectionResult,
  type UseZoomPanOptions,
  type UseZoomPanResult,
  type ZoomPanState,
} from "./hooks";
