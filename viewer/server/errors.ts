/**
 * Error types raised by the viewer host.
 */

export type ViewerErrorCode = "DECODE" | "WATCH" | "USAGE";

export class ViewerError extends Error {
  constructor(
    readonly code: ViewerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ViewerError";
  }
}

/** File missing, unreadable, truncated or not a supported raster format. */
export class DecodeError extends ViewerError {
  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super("DECODE", `${path}: ${reason}`, options);
    this.name = "DecodeError";
  }
}

/** The watched path cannot be observed; the viewer runs without reloads. */
export class WatchError extends ViewerError {
  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super("WATCH", `cannot watch ${path}: ${reason}`, options);
    this.name = "WatchError";
  }
}

/** Bad command line. */
export class UsageError extends ViewerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("USAGE", message, options);
    this.name = "UsageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
