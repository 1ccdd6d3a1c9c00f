/**
 * Page-level CSS for the viewer.
 * Injected once by the page entry; components style themselves with `sx`.
 */

import { COLORS } from "./colors";

export const baseCSS = `
/* ============================================================================
   Page
   ============================================================================ */

html, body {
  margin: 0;
  height: 100%;
  background-color: ${COLORS.BG};
  color: ${COLORS.TEXT_PRIMARY};
  font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif;
}

#root {
  min-height: 100%;
}

/* Image and histogram canvases */
.viewer-canvas {
  display: block;
  image-rendering: pixelated;
  image-rendering: crisp-edges;
}

.viewer-canvas-pan {
  cursor: grab;
}

.viewer-canvas-pan:active {
  cursor: grabbing;
}

.viewer-isoline-handle {
  cursor: ns-resize;
}

/* Status line */
.viewer-status {
  font-family: monospace;
  font-size: 11px;
  color: ${COLORS.TEXT_SECONDARY};
  white-space: pre;
  min-height: 16px;
}
`;

/** Append `baseCSS` to the document head once. */
export function injectBaseCSS(doc: Document): void {
  const id = "viewer-base-css";
  if (doc.getElementById(id)) return;
  const style = doc.createElement("style");
  style.id = id;
  style.textContent = baseCSS;
  doc.head.appendChild(style);
}
