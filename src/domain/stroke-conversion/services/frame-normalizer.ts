import type { RgbaBitmap } from '../value-objects/animation-source.js';
import type { CanvasSize, FitMode } from '../value-objects/conversion-parameters.js';

const EPSILON = 1e-9;

export interface NormalizedFrame {
  /** Exactly `width` x `height`, transparent outside the pasted frame. */
  readonly canvas: RgbaBitmap;
  readonly width: number;
  readonly height: number;
  readonly scale: number;
  readonly scaledWidth: number;
  readonly scaledHeight: number;
  readonly offsetX: number;
  readonly offsetY: number;
}

interface AxisTap {
  readonly source: number;
  readonly weight: number;
}

export function computeFitScale(frame: CanvasSize, target: CanvasSize, fitMode: FitMode): number {
  const scale = Math.min(target.width / frame.width, target.height / frame.height);
  return fitMode === 'shrink-only' ? Math.min(1, scale) : scale;
}

/**
 * Scales `frame` to fit inside `target` keeping its aspect ratio and pastes it,
 * centered, onto a fully transparent canvas of exactly the target size.
 */
export function normalizeFrame(
  frame: RgbaBitmap,
  target: CanvasSize,
  fitMode: FitMode = 'shrink-only',
): NormalizedFrame {
  assertDimensions(frame, 'Frame');
  assertDimensions(target, 'Target canvas');

  const scale = computeFitScale(frame, target, fitMode);
  const scaledWidth = scaledLength(frame.width, scale, target.width);
  const scaledHeight = scaledLength(frame.height, scale, target.height);
  const offsetX = Math.floor((target.width - scaledWidth) / 2);
  const offsetY = Math.floor((target.height - scaledHeight) / 2);

  const scaled =
    scaledWidth === frame.width && scaledHeight === frame.height
      ? frame
      : resampleAreaAverage(frame, scaledWidth, scaledHeight);

  const data = new Uint8ClampedArray(target.width * target.height * 4);
  const rowBytes = scaledWidth * 4;

  for (let y = 0; y < scaledHeight; y += 1) {
    const sourceStart = y * rowBytes;
    const destinationStart = ((offsetY + y) * target.width + offsetX) * 4;
    data.set(scaled.data.subarray(sourceStart, sourceStart + rowBytes), destinationStart);
  }

  return {
    canvas: { width: target.width, height: target.height, data },
    width: target.width,
    height: target.height,
    scale,
    scaledWidth,
    scaledHeight,
    offsetX,
    offsetY,
  };
}

/**
 * Box-filter resampling: every destination pixel averages the source area it covers,
 * weighting color by alpha so transparent pixels lend no color to their neighbours.
 */
export function resampleAreaAverage(
  source: RgbaBitmap,
  width: number,
  height: number,
): RgbaBitmap {
  const columns = buildAxisTaps(source.width, width);
  const rows = buildAxisTaps(source.height, height);
  const data = new Uint8ClampedArray(width * height * 4);

  for (let y = 0; y < height; y += 1) {
    const rowTaps = rows[y] ?? [];

    for (let x = 0; x < width; x += 1) {
      const columnTaps = columns[x] ?? [];
      let coverage = 0;
      let alphaSum = 0;
      let redSum = 0;
      let greenSum = 0;
      let blueSum = 0;

      for (const rowTap of rowTaps) {
        const rowOffset = rowTap.source * source.width;

        for (const columnTap of columnTaps) {
          const weight = rowTap.weight * columnTap.weight;
          const index = (rowOffset + columnTap.source) * 4;
          const alpha = source.data[index + 3] ?? 0;
          const weightedAlpha = weight * alpha;

          coverage += weight;
          alphaSum += weightedAlpha;
          redSum += weightedAlpha * (source.data[index] ?? 0);
          greenSum += weightedAlpha * (source.data[index + 1] ?? 0);
          blueSum += weightedAlpha * (source.data[index + 2] ?? 0);
        }
      }

      const target = (y * width + x) * 4;
      if (alphaSum <= 0 || coverage <= 0) {
        continue;
      }

      data[target] = Math.round(redSum / alphaSum);
      data[target + 1] = Math.round(greenSum / alphaSum);
      data[target + 2] = Math.round(blueSum / alphaSum);
      data[target + 3] = Math.round(alphaSum / coverage);
    }
  }

  return { width, height, data };
}

function buildAxisTaps(sourceLength: number, targetLength: number): AxisTap[][] {
  const ratio = sourceLength / targetLength;

  return Array.from({ length: targetLength }, (_, index) => {
    const start = index * ratio;
    const end = Math.min(sourceLength, (index + 1) * ratio);
    const taps: AxisTap[] = [];

    for (let sourceIndex = Math.floor(start); sourceIndex < end; sourceIndex += 1) {
      const overlap = Math.min(end, sourceIndex + 1) - Math.max(start, sourceIndex);
      if (overlap > EPSILON) {
        taps.push({ source: sourceIndex, weight: overlap });
      }
    }

    return taps;
  });
}

function scaledLength(length: number, scale: number, limit: number): number {
  return Math.min(limit, Math.max(1, Math.floor(length * scale + EPSILON)));
}

function assertDimensions(size: CanvasSize, label: string): void {
  if (!Number.isInteger(size.width) || !Number.isInteger(size.height)) {
    throw new RangeError(`${label} dimensions must be integers (${size.width}x${size.height})`);
  }

  if (size.width <= 0 || size.height <= 0) {
    throw new RangeError(`${label} dimensions must be positive (${size.width}x${size.height})`);
  }
}
