/**
 * Price and quantity precision helpers.
 * Exchange sizes and prices are always rounded toward zero so an order
 * never exceeds the amount the risk engine approved.
 */

const FLOAT_EPSILON = 1e-9;

/**
 * Number of decimals implied by a step such as 0.001 or 1e-5
 */
export function decimalsOf(step: number): number {
  if (!Number.isFinite(step) || step <= 0) return 0;
  const text = step.toString();
  if (text.includes("e-")) {
    const [mantissa, exponent] = text.split("e-");
    const mantissaDecimals = mantissa.includes(".") ? mantissa.split(".")[1].length : 0;
    return Number(exponent) + mantissaDecimals;
  }
  const dot = text.indexOf(".");
  return dot >= 0 ? text.length - dot - 1 : 0;
}

/**
 * Round down to a multiple of step without binary float drift
 */
export function floorToStep(value: number, step: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  if (!Number.isFinite(step) || step <= 0) return value;
  const units = Math.floor(value / step + FLOAT_EPSILON);
  return Number((units * step).toFixed(decimalsOf(step)));
}

/**
 * Round to the nearest multiple of step (used for protective prices, where
 * the direction is chosen by the caller)
 */
export function roundToStep(value: number, step: number): number {
  if (!Number.isFinite(step) || step <= 0) return value;
  const units = Math.round(value / step);
  return Number((units * step).toFixed(decimalsOf(step)));
}

/**
 * Accepts either a percent (1.0 = 1%) or a ratio (0.01 = 1%) and returns a ratio.
 * Values above 0.05 are read as percents.
 */
export function ratioFromPercentOrRatio(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return value > 0.05 ? value / 100 : value;
}

/**
 * Relative difference |a - b| / max(|b|, epsilon)
 */
export function relativeDiff(a: number, b: number): number {
  return Math.abs(a - b) / Math.max(Math.abs(b), FLOAT_EPSILON);
}
