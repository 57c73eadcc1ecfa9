import path from 'node:path';

import type { AnimationSource, FitMode } from '@domain/stroke-conversion/index.js';
import { DEFAULT_CONVERSION_PARAMETERS } from '@domain/stroke-conversion/index.js';

export interface CliOptions {
  input: string;
  output: string;
  width: number;
  height: number;
  thickness: number;
  stride: number;
  threshold: number;
  maxFrames: number | null;
  fitMode: FitMode;
  preview: string | null;
}

export const USAGE =
  'Usage: npm run convert -- --input <gif|png> [--output <json>] [--width 100] [--height 100] ' +
  '[--thickness 2] [--stride 1] [--threshold 10] [--max-frames 0] [--fit shrink-only|contain] [--preview <gif>]';

export function parseCliArguments(argv: string[]): CliOptions {
  let input: string | undefined;
  let output: string | undefined;
  let preview: string | null = null;
  let maxFrames: number | null = DEFAULT_CONVERSION_PARAMETERS.maxFrames;
  let fitMode: FitMode = DEFAULT_CONVERSION_PARAMETERS.fitMode;
  let { width, height } = DEFAULT_CONVERSION_PARAMETERS.canvas;
  let thickness = DEFAULT_CONVERSION_PARAMETERS.brushThickness;
  let stride = DEFAULT_CONVERSION_PARAMETERS.samplingStride;
  let threshold = DEFAULT_CONVERSION_PARAMETERS.transparencyThreshold;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('--')) {
      throw new Error(`Unexpected argument: ${arg}\n${USAGE}`);
    }

    const next = argv[i + 1];
    const value = (): string => {
      if (next === undefined || next.startsWith('--')) {
        throw new Error(`Missing value for ${arg}\n${USAGE}`);
      }
      i += 1;
      return next;
    };

    switch (arg) {
      case '--input':
        input = value();
        break;
      case '--output':
        output = value();
        break;
      case '--width':
        width = parseInteger(arg, value());
        break;
      case '--height':
        height = parseInteger(arg, value());
        break;
      case '--thickness':
        thickness = parseInteger(arg, value());
        break;
      case '--stride':
        stride = parseInteger(arg, value());
        break;
      case '--threshold':
        threshold = parseInteger(arg, value());
        break;
      case '--max-frames': {
        const limit = parseInteger(arg, value());
        maxFrames = limit === 0 ? null : limit;
        break;
      }
      case '--fit': {
        const mode = value();
        if (mode !== 'shrink-only' && mode !== 'contain') {
          throw new Error(`--fit expects "shrink-only" or "contain", received "${mode}"`);
        }
        fitMode = mode;
        break;
      }
      case '--preview':
        preview = value();
        break;
      default:
        throw new Error(`Unknown argument: ${arg}\n${USAGE}`);
    }
  }

  if (!input) {
    throw new Error(USAGE);
  }

  return {
    input,
    output: output ?? defaultOutputPath(input),
    width,
    height,
    thickness,
    stride,
    threshold,
    maxFrames,
    fitMode,
    preview,
  };
}

export function defaultOutputPath(input: string): string {
  return `${path.basename(input, path.extname(input))}_strokes.json`;
}

export function inferSource(input: string): AnimationSource {
  return path.extname(input).toLowerCase() === '.png'
    ? { type: 'png', path: input }
    : { type: 'gif', path: input };
}

function parseInteger(flag: string, raw: string): number {
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`${flag} expects an integer, received "${raw}"`);
  }

  return Number.parseInt(raw, 10);
}
