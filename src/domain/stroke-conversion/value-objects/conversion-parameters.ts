export interface CanvasSize {
  readonly width: number;
  readonly height: number;
}

/**
 * `shrink-only` scales a frame down by the smaller of the two axis ratios but never
 * enlarges it, so small frames keep their size. `contain` applies the same ratio
 * without the cap and fills the canvas.
 */
export type FitMode = 'contain' | 'shrink-only';

export interface EncoderParameters {
  readonly brushThickness: number;
  readonly samplingStride: number;
  readonly transparencyThreshold: number;
}

export interface ConversionParameters extends EncoderParameters {
  readonly canvas: CanvasSize;
  readonly maxFrames: number | null;
  readonly fitMode: FitMode;
}

export const DEFAULT_CONVERSION_PARAMETERS: ConversionParameters = {
  canvas: { width: 100, height: 100 },
  brushThickness: 2,
  samplingStride: 1,
  transparencyThreshold: 10,
  maxFrames: null,
  fitMode: 'shrink-only',
};
