import type { AnimationSource } from '../value-objects/animation-source.js';
import type { ConversionParameters } from '../value-objects/conversion-parameters.js';

export interface ConversionJobProps {
  readonly id: string;
  readonly source: AnimationSource;
  readonly parameters: ConversionParameters;
  readonly createdAt: Date;
}

export class ConversionJob {
  public readonly id: string;

  public readonly source: AnimationSource;

  public readonly parameters: ConversionParameters;

  public readonly createdAt: Date;

  private constructor(props: ConversionJobProps) {
    this.id = props.id;
    this.source = props.source;
    this.parameters = props.parameters;
    this.createdAt = props.createdAt;
  }

  public static create(props: ConversionJobProps): ConversionJob {
    const { canvas, brushThickness, samplingStride, transparencyThreshold, maxFrames } =
      props.parameters;

    if (!isPositiveInteger(canvas.width) || !isPositiveInteger(canvas.height)) {
      throw new Error('Output canvas must define positive integer dimensions');
    }

    if (!isPositiveInteger(brushThickness)) {
      throw new Error('Brush thickness must be a positive integer');
    }

    if (!isPositiveInteger(samplingStride)) {
      throw new Error('Sampling stride must be a positive integer');
    }

    if (
      !Number.isInteger(transparencyThreshold) ||
      transparencyThreshold < 0 ||
      transparencyThreshold > 255
    ) {
      throw new Error('Transparency threshold must be an integer between 0 and 255');
    }

    if (maxFrames !== null && !isPositiveInteger(maxFrames)) {
      throw new Error('Frame limit must be a positive integer when set');
    }

    if (props.source.type === 'frameSequence' && props.source.frames.length === 0) {
      throw new Error('Frame sequence must contain at least one frame');
    }

    return new ConversionJob(props);
  }

  /** Stable key for results produced from `fingerprint` with this job's parameters. */
  public cacheKey(fingerprint: string): string {
    const { canvas, brushThickness, samplingStride, transparencyThreshold, maxFrames, fitMode } =
      this.parameters;

    return [
      fingerprint,
      `${canvas.width}x${canvas.height}`,
      `t${brushThickness}`,
      `s${samplingStride}`,
      `a${transparencyThreshold}`,
      `m${maxFrames ?? 'all'}`,
      fitMode,
    ].join(':');
  }
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
