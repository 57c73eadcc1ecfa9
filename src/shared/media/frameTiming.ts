export const DEFAULT_FRAME_RATE = 10;

/**
 * Nominal playback rate for a declared inter-frame delay. Animations that declare no
 * delay (or a non-positive one) play at {@link DEFAULT_FRAME_RATE}.
 */
export function resolveNominalFrameRate(delayMs: number | undefined): number {
  if (delayMs === undefined || !Number.isFinite(delayMs) || delayMs <= 0) {
    return DEFAULT_FRAME_RATE;
  }

  return 1000 / delayMs;
}
