import { AppError } from '@/shared/errors/app-error.js';
import { resolveNominalFrameRate } from '@/shared/media/frameTiming.js';

import type { DecodedAnimation, RgbaBitmap } from '../value-objects/animation-source.js';
import type { ConversionParameters } from '../value-objects/conversion-parameters.js';
import type { ConversionResult, FrameResult } from '../value-objects/drawing-command.js';

import { normalizeFrame } from './frame-normalizer.js';
import type { ProgressReporter } from './progress-reporter.js';
import { encodeScanlines } from './scanline-encoder.js';

export interface AggregationContext {
  readonly reporter: ProgressReporter;
  readonly signal?: AbortSignal;
}

/**
 * Encodes frames one at a time, in order, stopping once `maxFrames` results have been
 * produced. The abort signal is checked before each frame.
 */
export function* generateFrameResults(
  frames: Iterable<RgbaBitmap>,
  parameters: ConversionParameters,
  context: AggregationContext,
): Generator<FrameResult, number, undefined> {
  const { reporter, signal } = context;
  let produced = 0;

  for (const frame of frames) {
    if (parameters.maxFrames !== null && produced >= parameters.maxFrames) {
      reporter.info(`Frame limit (${parameters.maxFrames}) reached. Stopping.`);
      break;
    }

    if (signal?.aborted) {
      throw AppError.cancelled('stroke-conversion.cancelled', { framesProcessed: produced });
    }

    const frameNumber = produced + 1;
    reporter.info(`Processing frame ${frameNumber}...`);

    const { canvas } = normalizeFrame(frame, parameters.canvas, parameters.fitMode);
    const commands = encodeScanlines(canvas, parameters);
    produced += 1;

    reporter.info(`Frame ${frameNumber}: ${commands.length} command(s) generated`);
    yield commands;
  }

  return produced;
}

export function aggregateFrames(
  animation: DecodedAnimation,
  parameters: ConversionParameters,
  context: AggregationContext,
): ConversionResult {
  const { declaredDelayMs } = animation.metadata;
  const originalFps = resolveNominalFrameRate(declaredDelayMs);

  if (declaredDelayMs === undefined) {
    context.reporter.info(`Source declares no frame delay; using ${originalFps} fps.`);
  } else {
    context.reporter.info(`Source frame rate: ${originalFps.toFixed(2)} fps`);
  }

  const frames: FrameResult[] = [];
  let totalCommands = 0;

  for (const frame of generateFrameResults(animation.frames, parameters, context)) {
    frames.push(frame);
    totalCommands += frame.length;
  }

  return {
    frames,
    metadata: {
      width: parameters.canvas.width,
      height: parameters.canvas.height,
      originalFps,
      frameCount: frames.length,
      totalCommands,
      processingOptions: {
        brushThickness: parameters.brushThickness,
        samplingStride: parameters.samplingStride,
        transparencyThreshold: parameters.transparencyThreshold,
        maxFrames: parameters.maxFrames,
      },
    },
  };
}
