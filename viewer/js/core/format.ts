/**
 * Number and text formatting utilities.
 */

function stripTrailingZeros(text: string): string {
  return text.includes(".") ? text.replace(/\.?0+$/, "") : text;
}

/**
 * Format with a fixed number of significant digits, printf "%g" style:
 * trailing zeros are dropped and exponent form is used when the decimal
 * exponent is below -4 or at least `digits`.
 * @example formatSignificant(30) === "30", formatSignificant(1234) === "1.23e+03"
 */
export function formatSignificant(val: number, digits: number = 3): string {
  if (Number.isNaN(val)) return "nan";
  if (!Number.isFinite(val)) return val > 0 ? "inf" : "-inf";
  if (val === 0) return "0";

  const precision = Math.max(1, Math.floor(digits));
  // toExponential rounds first, so 999.6 reports exponent 3, not 2
  const [mantissa, exponentText] = val.toExponential(precision - 1).split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= precision) {
    const sign = exponent < 0 ? "-" : "+";
    const magnitude = String(Math.abs(exponent)).padStart(2, "0");
    return `${stripTrailingZeros(mantissa)}e${sign}${magnitude}`;
  }
  return stripTrailingZeros(val.toFixed(precision - 1 - exponent));
}

/**
 * Format time duration.
 * @param seconds - Duration in seconds
 * @returns Formatted string (e.g., "1.5 s" or "150 ms")
 */
export function formatDuration(seconds: number): string {
  if (seconds < 0.001) {
    return `${(seconds * 1e6).toFixed(0)} µs`;
  }
  if (seconds < 1) {
    return `${(seconds * 1000).toFixed(1)} ms`;
  }
  if (seconds < 60) {
    return `${seconds.toFixed(2)} s`;
  }
  const mins = Math.floor(seconds / 60);
  const secs = seconds % 60;
  return `${mins}m ${secs.toFixed(0)}s`;
}

/**
 * Clamp a value between min and max.
 */
export function clamp(val: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, val));
}
