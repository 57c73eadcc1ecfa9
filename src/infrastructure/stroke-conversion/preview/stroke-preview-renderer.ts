import { createCanvas, type SKRSContext2D } from '@napi-rs/canvas';
import { applyPalette, GIFEncoder, quantize } from 'gifenc';

import type {
  ConversionMetadata,
  ConversionResult,
  FrameResult,
} from '@domain/stroke-conversion/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

export interface PreviewOptions {
  /** Raster pixels per canvas cell. */
  pixelScale: number;
  /** Fill painted under the strokes; `null` leaves PNG frames transparent. */
  background: string | null;
  /** 0 loops forever, -1 plays once. */
  repeat: number;
  /** Palette size per GIF frame, 2 to 256. */
  maxColors: number;
}

const DEFAULT_OPTIONS: PreviewOptions = {
  pixelScale: 4,
  background: '#FFFFFF',
  repeat: 0,
  maxColors: 256,
};

const GIF_FALLBACK_BACKGROUND = '#FFFFFF';

/**
 * Replays drawing commands onto a raster canvas, the way a playback client would,
 * to eyeball a conversion without the client.
 */
export class StrokePreviewRenderer {
  private readonly logger = createChildLogger({ module: 'StrokePreviewRenderer' });

  private readonly options: PreviewOptions;

  public constructor(options: Partial<PreviewOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options } satisfies PreviewOptions;

    if (!Number.isInteger(this.options.pixelScale) || this.options.pixelScale < 1) {
      throw new RangeError('Preview pixel scale must be a positive integer');
    }

    if (
      !Number.isInteger(this.options.maxColors) ||
      this.options.maxColors < 2 ||
      this.options.maxColors > 256
    ) {
      throw new RangeError('Preview palette size must be an integer between 2 and 256');
    }
  }

  public renderFramePng(frame: FrameResult, metadata: ConversionMetadata): Buffer {
    const { width, height } = this.rasterSize(metadata);
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');

    this.drawFrame(ctx, frame, metadata, this.options.background);

    return canvas.toBuffer('image/png');
  }

  public renderAnimatedGif(result: ConversionResult): Buffer {
    const { metadata } = result;
    const { width, height } = this.rasterSize(metadata);
    const canvas = createCanvas(width, height);
    const ctx = canvas.getContext('2d');
    const encoder = GIFEncoder();
    const delay = Math.max(10, Math.round(1000 / metadata.originalFps));
    const background = this.options.background ?? GIF_FALLBACK_BACKGROUND;

    for (const frame of result.frames) {
      this.drawFrame(ctx, frame, metadata, background);
      const { data } = ctx.getImageData(0, 0, width, height);
      const palette = quantize(data, this.options.maxColors);

      encoder.writeFrame(applyPalette(data, palette), width, height, {
        palette,
        delay,
        repeat: this.options.repeat,
      });
    }

    encoder.finish();
    const gif = Buffer.from(encoder.bytes());

    this.logger.debug(
      { frames: result.frames.length, width, height, bytes: gif.byteLength },
      'Rendered animated preview',
    );

    return gif;
  }

  private rasterSize(metadata: ConversionMetadata): { width: number; height: number } {
    return {
      width: metadata.width * this.options.pixelScale,
      height: metadata.height * this.options.pixelScale,
    };
  }

  private drawFrame(
    ctx: SKRSContext2D,
    frame: FrameResult,
    metadata: ConversionMetadata,
    background: string | null,
  ): void {
    const { pixelScale } = this.options;
    const { width, height } = this.rasterSize(metadata);
    const halfCell = pixelScale / 2;

    ctx.clearRect(0, 0, width, height);
    if (background !== null) {
      ctx.fillStyle = background;
      ctx.fillRect(0, 0, width, height);
    }

    ctx.lineCap = 'square';
    ctx.lineWidth = metadata.processingOptions.samplingStride * pixelScale;

    for (const command of frame) {
      ctx.strokeStyle = command.color;
      ctx.beginPath();
      ctx.moveTo(command.start[0] * width + halfCell, command.start[1] * height + halfCell);
      ctx.lineTo(command.end[0] * width + halfCell, command.end[1] * height + halfCell);
      ctx.stroke();
    }
  }
}
