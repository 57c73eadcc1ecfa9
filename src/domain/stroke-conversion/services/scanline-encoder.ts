import { hexColorAt } from '@/shared/media/colorCodec.js';

import type { RgbaBitmap } from '../value-objects/animation-source.js';
import type { EncoderParameters } from '../value-objects/conversion-parameters.js';
import type { DrawingCommand } from '../value-objects/drawing-command.js';

type RunState =
  | { readonly kind: 'idle' }
  | { readonly kind: 'open'; readonly startX: number; readonly lastX: number; readonly color: string };

const IDLE: RunState = { kind: 'idle' };

/**
 * Scans every `samplingStride`-th row of the canvas and emits one command per maximal
 * run of visited, opaque, same-colored pixels. Runs end at the last visited column
 * they include, so at strides above 1 a run never claims skipped pixels.
 */
export function encodeScanlines(canvas: RgbaBitmap, parameters: EncoderParameters): DrawingCommand[] {
  const { samplingStride } = parameters;
  const commands: DrawingCommand[] = [];

  for (let y = 0; y < canvas.height; y += samplingStride) {
    encodeRow(canvas, y, parameters, commands);
  }

  return commands;
}

function encodeRow(
  canvas: RgbaBitmap,
  y: number,
  parameters: EncoderParameters,
  commands: DrawingCommand[],
): void {
  const { samplingStride, transparencyThreshold } = parameters;
  const rowOffset = y * canvas.width;
  let run: RunState = IDLE;

  for (let x = 0; x < canvas.width; x += samplingStride) {
    const index = (rowOffset + x) * 4;
    const alpha = canvas.data[index + 3] ?? 0;

    if (alpha <= transparencyThreshold) {
      if (run.kind === 'open') {
        commands.push(toCommand(canvas, y, run, parameters));
        run = IDLE;
      }
      continue;
    }

    const color = hexColorAt(canvas.data, index);

    if (run.kind === 'idle') {
      run = { kind: 'open', startX: x, lastX: x, color };
    } else if (run.color !== color) {
      commands.push(toCommand(canvas, y, run, parameters));
      run = { kind: 'open', startX: x, lastX: x, color };
    } else {
      run = { ...run, lastX: x };
    }
  }

  if (run.kind === 'open') {
    commands.push(toCommand(canvas, y, run, parameters));
  }
}

function toCommand(
  canvas: RgbaBitmap,
  y: number,
  run: Extract<RunState, { kind: 'open' }>,
  parameters: EncoderParameters,
): DrawingCommand {
  const normalizedY = y / canvas.height;

  return {
    start: [run.startX / canvas.width, normalizedY],
    end: [run.lastX / canvas.width, normalizedY],
    color: run.color,
    thickness: parameters.brushThickness,
  };
}
