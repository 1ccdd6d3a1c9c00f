/**
 * Shared color palette for the viewer page.
 * Single source of truth for the image panel, histogram and isoline.
 */

// Primary color definitions (SCREAMING_SNAKE_CASE for constants)
export const COLORS = {
  // Backgrounds
  BG: "#1a1a1a",
  BG_PANEL: "#222",
  BG_INPUT: "#333",
  BG_CANVAS: "#000",

  // Borders
  BORDER: "#444",
  BORDER_LIGHT: "#555",

  // Text
  TEXT_PRIMARY: "#fff",
  TEXT_SECONDARY: "#aaa",
  TEXT_MUTED: "#888",
  TEXT_DIM: "#666",

  // Accent colors
  ACCENT: "#0af",
  ACCENT_GREEN: "#0f0",
  ACCENT_ORANGE: "#fa0",

  // Histogram bars, inside and outside the level window
  BAR_ACTIVE: "#888",
  BAR_INACTIVE: "#444",
  LEVEL_REGION: "rgba(0, 170, 255, 0.15)",
} as const;

/** Per-channel bar colors for vector images (R, G, B, A). */
export const CHANNEL_COLORS = ["#f44", "#4f4", "#48f", "#ccc"] as const;

// Convenience alias with camelCase keys
export const colors = {
  bg: COLORS.BG,
  bgPanel: COLORS.BG_PANEL,
  bgInput: COLORS.BG_INPUT,
  bgCanvas: COLORS.BG_CANVAS,
  border: COLORS.BORDER,
  borderLight: COLORS.BORDER_LIGHT,
  textPrimary: COLORS.TEXT_PRIMARY,
  textSecondary: COLORS.TEXT_SECONDARY,
  textMuted: COLORS.TEXT_MUTED,
  textDim: COLORS.TEXT_DIM,
  accent: COLORS.ACCENT,
  accentGreen: COLORS.ACCENT_GREEN,
  accentOrange: COLORS.ACCENT_ORANGE,
  barActive: COLORS.BAR_ACTIVE,
  barInactive: COLORS.BAR_INACTIVE,
  levelRegion: COLORS.LEVEL_REGION,
} as const;
