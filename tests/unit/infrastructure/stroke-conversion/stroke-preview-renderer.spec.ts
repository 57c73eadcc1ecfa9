import { afterEach, describe, expect, it, vi } from 'vitest';

import type { ConversionResult } from '@domain/stroke-conversion/index.js';

const drawCalls: string[] = [];
const encoderCalls: string[] = [];
const lineWidths: number[] = [];

class RecordingContext {
  public fillStyle = '';

  public strokeStyle = '';

  public lineCap = 'butt';

  private currentLineWidth = 1;

  public constructor(
    private readonly width: number,
    private readonly height: number,
  ) {}

  public get lineWidth(): number {
    return this.currentLineWidth;
  }

  public set lineWidth(value: number) {
    this.currentLineWidth = value;
    lineWidths.push(value);
  }

  public clearRect(x: number, y: number, w: number, h: number): void {
    drawCalls.push(`clearRect(${x},${y},${w},${h})`);
  }

  public fillRect(x: number, y: number, w: number, h: number): void {
    drawCalls.push(`fillRect(${x},${y},${w},${h}) ${this.fillStyle}`);
  }

  public beginPath(): void {
    drawCalls.push('beginPath');
  }

  public moveTo(x: number, y: number): void {
    drawCalls.push(`moveTo(${x},${y})`);
  }

  public lineTo(x: number, y: number): void {
    drawCalls.push(`lineTo(${x},${y})`);
  }

  public stroke(): void {
    drawCalls.push(`stroke ${this.strokeStyle} ${this.lineCap}`);
  }

  public getImageData(x: number, y: number, w: number, h: number): { data: Uint8ClampedArray } {
    drawCalls.push(`getImageData(${x},${y},${w},${h})`);
    return { data: new Uint8ClampedArray(this.width * this.height * 4) };
  }
}

const PALETTE = [
  [255, 255, 255],
  [255, 0, 0],
];

const createFakeEncoder = () => ({
  writeFrame: (
    index: Uint8Array,
    width: number,
    height: number,
    options: { palette: number[][]; delay: number; repeat: number },
  ) => {
    encoderCalls.push(
      `writeFrame(${index.length},${width},${height}) delay=${options.delay} repeat=${options.repeat} colors=${options.palette.length}`,
    );
  },
  finish: () => {
    encoderCalls.push('finish');
  },
  bytes: () => new Uint8Array(Buffer.from('GIF89a')),
});

const mockGraphics = () => {
  vi.doMock('@napi-rs/canvas', () => ({
    createCanvas: (width: number, height: number) => {
      const context = new RecordingContext(width, height);
      return {
        getContext: () => context,
        toBuffer: (mime: string) => Buffer.from(`${mime} ${width}x${height}`),
      };
    },
  }));
  vi.doMock('gifenc', () => ({
    GIFEncoder: createFakeEncoder,
    quantize: (rgba: Uint8ClampedArray, maxColors: number) => {
      encoderCalls.push(`quantize(${rgba.length},${maxColors})`);
      return PALETTE;
    },
    applyPalette: (rgba: Uint8ClampedArray) => new Uint8Array(rgba.length / 4),
  }));
};

const result: ConversionResult = {
  frames: [
    [{ start: [0.25, 0.5], end: [0.75, 0.5], color: '#FF0000', thickness: 2 }],
    [],
  ],
  metadata: {
    width: 4,
    height: 2,
    originalFps: 10,
    frameCount: 2,
    totalCommands: 1,
    processingOptions: {
      brushThickness: 2,
      samplingStride: 1,
      transparencyThreshold: 10,
      maxFrames: null,
    },
  },
};

afterEach(() => {
  drawCalls.length = 0;
  encoderCalls.length = 0;
  lineWidths.length = 0;
  vi.resetModules();
  vi.doUnmock('@napi-rs/canvas');
  vi.doUnmock('gifenc');
});

describe('StrokePreviewRenderer', () => {
  it('draws commands at cell centers on a scaled raster', async () => {
    mockGraphics();
    const { StrokePreviewRenderer } = await import(
      '../../../../src/infrastructure/stroke-conversion/preview/stroke-preview-renderer.js'
    );
    const renderer = new StrokePreviewRenderer();
    const [frame = []] = result.frames;

    const png = renderer.renderFramePng(frame, result.metadata);

    expect(png.toString()).toBe('image/png 16x8');
    expect(lineWidths).toEqual([4]);
    expect(drawCalls).toEqual([
      'clearRect(0,0,16,8)',
      'fillRect(0,0,16,8) #FFFFFF',
      'beginPath',
      'moveTo(6,6)',
      'lineTo(14,6)',
      'stroke #FF0000 square',
    ]);
  });

  it('leaves PNG frames unfilled without a background', async () => {
    mockGraphics();
    const { StrokePreviewRenderer } = await import(
      '../../../../src/infrastructure/stroke-conversion/preview/stroke-preview-renderer.js'
    );
    const renderer = new StrokePreviewRenderer({ background: null, pixelScale: 1 });

    renderer.renderFramePng([], result.metadata);

    expect(drawCalls).toEqual(['clearRect(0,0,4,2)']);
  });

  it('encodes one GIF frame per result frame at the nominal frame rate', async () => {
    mockGraphics();
    const { StrokePreviewRenderer } = await import(
      '../../../../src/infrastructure/stroke-conversion/preview/stroke-preview-renderer.js'
    );
    const renderer = new StrokePreviewRenderer();

    const gif = renderer.renderAnimatedGif(result);

    expect(gif.toString('latin1')).toBe('GIF89a');
    expect(encoderCalls).toEqual([
      'quantize(512,256)',
      'writeFrame(128,16,8) delay=100 repeat=0 colors=2',
      'quantize(512,256)',
      'writeFrame(128,16,8) delay=100 repeat=0 colors=2',
      'finish',
    ]);
  });

  it('rejects a non-integer pixel scale and an unusable palette size', async () => {
    mockGraphics();
    const { StrokePreviewRenderer } = await import(
      '../../../../src/infrastructure/stroke-conversion/preview/stroke-preview-renderer.js'
    );

    expect(() => new StrokePreviewRenderer({ pixelScale: 1.5 })).toThrow(RangeError);
    expect(() => new StrokePreviewRenderer({ maxColors: 1 })).toThrow(RangeError);
  });
});
