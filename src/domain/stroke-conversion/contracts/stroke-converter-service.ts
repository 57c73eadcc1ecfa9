import type { ConversionJob } from '../entities/conversion-job.js';
import type { ConversionResult } from '../value-objects/drawing-command.js';

import type { ProgressSink } from './progress-sink.js';

export interface ConversionMetrics {
  readonly decodeTimeMs: number;
  readonly encodeTimeMs: number;
  readonly totalTimeMs: number;
  readonly averageFrameEncodingMs: number;
}

export interface ConversionOutcome {
  readonly result: ConversionResult;
  readonly metrics: ConversionMetrics;
  readonly fromCache: boolean;
}

export interface ConversionObserver {
  readonly progress?: ProgressSink;
  readonly signal?: AbortSignal;
}

export interface StrokeConverterService {
  convert(job: ConversionJob, observer?: ConversionObserver): Promise<ConversionOutcome>;
}
