/** `[x, y]` as fractions of the canvas width and height. */
export type NormalizedPoint = readonly [x: number, y: number];

/**
 * One horizontal line of a single color. `start[1] === end[1]` and
 * `start[0] <= end[0]` for every command the encoder emits.
 */
export interface DrawingCommand {
  readonly start: NormalizedPoint;
  readonly end: NormalizedPoint;
  readonly color: string;
  readonly thickness: number;
}

export type FrameResult = readonly DrawingCommand[];

export interface ProcessingOptions {
  readonly brushThickness: number;
  readonly samplingStride: number;
  readonly transparencyThreshold: number;
  readonly maxFrames: number | null;
}

export interface ConversionMetadata {
  readonly width: number;
  readonly height: number;
  readonly originalFps: number;
  readonly frameCount: number;
  readonly totalCommands: number;
  readonly processingOptions: ProcessingOptions;
}

export interface ConversionResult {
  readonly frames: readonly FrameResult[];
  readonly metadata: ConversionMetadata;
}
