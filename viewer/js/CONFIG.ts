/**
 * Global configuration for imview.
 * Host defaults, layout constants and styling presets for the page.
 */

// Import colors from single source of truth
import { COLORS, colors } from "./core/colors";
export { COLORS, colors };

// ============================================================================
// HOST
// ============================================================================
export const SERVER = {
    HOST: "127.0.0.1",
    PORT: 8765,
    SOCKET_PATH: "/ws",
};

/** Image shown when no path is given on the command line */
export const DEFAULT_PATH = "out/latest.ppm";

export const WATCH = {
    // Wait for the file size to hold still this long before reporting a write
    STABILITY_MS: 100,
    POLL_MS: 25,
    // Coalesce bursts of change events into one reload
    DEBOUNCE_MS: 50,
};

export const LEVELS = {
    BINS: 256,
    // Default for --preserve-levels
    PRESERVE_ON_RELOAD: false,
};

export const ISOLINE = {
    INITIAL: 0.8,
};

export const WINDOW = {
    TITLE: "simple image viewer",
    WIDTH: 800,
    HEIGHT: 450,
};

// ============================================================================
// TYPOGRAPHY
// ============================================================================
export const TYPOGRAPHY = {
    LABEL: {
        color: COLORS.TEXT_SECONDARY,
        fontSize: 11,
    },
    LABEL_SMALL: {
        color: COLORS.TEXT_MUTED,
        fontSize: 10,
    },
    VALUE: {
        color: COLORS.TEXT_MUTED,
        fontSize: 10,
        fontFamily: "monospace",
    },
    TITLE: {
        color: COLORS.ACCENT,
        fontWeight: "bold" as const,
    },
};

// ============================================================================
// CONTROL PANEL STYLES
// ============================================================================
export const CONTROL_PANEL = {
    // Standard control group (height: 32px)
    GROUP: {
        bgcolor: COLORS.BG_PANEL,
        px: 1.5,
        py: 0.5,
        borderRadius: 1,
        border: `1px solid ${COLORS.BORDER}`,
        height: 32,
    },
    // Compact button
    BUTTON: {
        color: COLORS.TEXT_MUTED,
        fontSize: 10,
        cursor: "pointer",
        "&:hover": { color: COLORS.TEXT_PRIMARY },
        bgcolor: COLORS.BG_PANEL,
        px: 1,
        py: 0.25,
        borderRadius: 0.5,
        border: `1px solid ${COLORS.BORDER}`,
    },
    // Select dropdown
    SELECT: {
        minWidth: 90,
        bgcolor: COLORS.BG_INPUT,
        color: COLORS.TEXT_PRIMARY,
        fontSize: 11,
        "& .MuiSelect-select": {
            py: 0.5,
        },
    },
};

// ============================================================================
// CONTAINER STYLES
// ============================================================================
export const CONTAINER = {
    ROOT: {
        p: 2,
        bgcolor: "transparent",
        color: "inherit",
        fontFamily: "monospace",
        borderRadius: 1,
        // Dropdowns open upward past the panel edge
        overflow: "visible",
    },
    IMAGE_BOX: {
        bgcolor: COLORS.BG_CANVAS,
        border: `1px solid ${COLORS.BORDER}`,
        overflow: "hidden",
        position: "relative" as const,
    },
};

// ============================================================================
// PANEL SIZES
// ============================================================================
export const PANEL = {
    // Main image canvas fills the window minus the histogram column
    MAIN: {
        WIDTH: WINDOW.WIDTH - 160,
        HEIGHT: WINDOW.HEIGHT - 80,
    },
    // Vertical histogram beside the image
    HISTOGRAM: {
        WIDTH: 96,
        DISPLAY_BINS: 64,
        // Grab distance around the isoline, CSS pixels
        ISOLINE_GRAB: 5,
    },
    COLORBAR: {
        WIDTH: 10,
    },
};

// ============================================================================
// POINTER
// ============================================================================
export const POINTER = {
    // At most one pointer/move message per this many ms
    THROTTLE_MS: 16,
};
