const DEFAULT_PRECISION = 2;

export function roundToPrecision(value: number, precision = DEFAULT_PRECISION): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/** Rounds to the nearest integer and clamps into `[min, max]`. */
export function clampToByte(value: number, min = 0, max = 255): number {
  return Math.max(min, Math.min(max, Math.round(value)));
}
