import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import {
  ConvertAnimationCommand,
  ConvertAnimationHandler,
} from '@/application/stroke-conversion/index.js';
import {
  JsonResultWriter,
  LoggerProgressSink,
  ScanlineStrokeConverterService,
  StrokePreviewRenderer,
} from '@/infrastructure/stroke-conversion/index.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { roundToPrecision } from '@/shared/media/numberUtils.js';

import { inferSource, parseCliArguments } from './lib/cli-arguments.js';

const logger = createChildLogger({ module: 'cli' });

async function main(): Promise<void> {
  const options = parseCliArguments(process.argv.slice(2));
  const handler = new ConvertAnimationHandler(
    new ScanlineStrokeConverterService(),
    new JsonResultWriter(),
  );

  const { outcome, persistence } = await handler.execute(
    new ConvertAnimationCommand({
      id: randomUUID(),
      source: inferSource(options.input),
      parameters: {
        canvas: { width: options.width, height: options.height },
        brushThickness: options.thickness,
        samplingStride: options.stride,
        transparencyThreshold: options.threshold,
        maxFrames: options.maxFrames,
        fitMode: options.fitMode,
      },
      outputPath: options.output,
    }),
    { progress: new LoggerProgressSink() },
  );

  logger.info(
    {
      frames: outcome.result.metadata.frameCount,
      commands: outcome.result.metadata.totalCommands,
      fps: roundToPrecision(outcome.result.metadata.originalFps),
      decodeMs: roundToPrecision(outcome.metrics.decodeTimeMs),
      encodeMs: roundToPrecision(outcome.metrics.encodeTimeMs),
    },
    'Conversion summary',
  );

  if (options.preview) {
    const previewPath = path.resolve(options.preview);
    const gif = new StrokePreviewRenderer().renderAnimatedGif(outcome.result);
    await fs.mkdir(path.dirname(previewPath), { recursive: true });
    await fs.writeFile(previewPath, gif);
    logger.info({ previewPath, bytes: gif.byteLength }, 'Preview written');
  }

  if (persistence.status === 'failed') {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Conversion aborted');
  process.exitCode = 1;
});
