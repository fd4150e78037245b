/**
 * @description
 * Linear interpolation from `start` (t = 0) to `end` (t = 1).
 * The factor is not clamped: t outside [0, 1] extrapolates.
 *
 * @example
 * ```typescript
 * lerp(0, 100, 0.5);  // Returns 50
 * lerp(0, 100, 1.5);  // Returns 150
 * ```
 */
export function lerp(start: number, end: number, t: number): number {
  return start + (end - start) * t;
}

/**
 * @description
 * Clamps a value to the range [0, 1].
 */
export function clamp01(value: number): number {
  return value < 0 ? 0 : value > 1 ? 1 : value;
}

/**
 * @description
 * Wraps an angle in degrees into the range [0, 360).
 */
export function normalizeAngle(degrees: number): number {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

/**
 * @description
 * Interpolates between two angles in degrees along the shortest arc.
 *
 * The result is normalized to [0, 360), so blending from 350 to 10
 * passes through 0 instead of travelling backwards through 180.
 *
 * @example
 * ```typescript
 * lerpAngle(350, 10, 0.5);  // Returns 0
 * lerpAngle(350, 10, 0.25); // Returns 355
 * lerpAngle(10, 350, 0.5);  // Returns 0
 * ```
 */
export function lerpAngle(start: number, end: number, t: number): number {
  let delta = normalizeAngle(end - start);
  if (delta > 180) delta -= 360;
  return normalizeAngle(start + delta * t);
}
