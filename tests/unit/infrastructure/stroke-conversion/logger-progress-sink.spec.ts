import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { LoggerProgressSink } from '@/infrastructure/stroke-conversion/index.js';

import { silentLogger } from '../../../helpers/bitmaps.js';

describe('LoggerProgressSink', () => {
  const createLogger = (): Logger => {
    const logger = silentLogger.child({ module: 'progress-test' });
    vi.spyOn(logger, 'info');
    vi.spyOn(logger, 'error');
    return logger;
  };

  it('logs info and success events at info level', () => {
    const logger = createLogger();
    const sink = new LoggerProgressSink(logger);

    sink.notify({ message: 'Processing frame 1...', severity: 'info' });
    sink.notify({ message: 'Conversion complete', severity: 'success' });

    expect(logger.info).toHaveBeenNthCalledWith(1, { severity: 'info' }, 'Processing frame 1...');
    expect(logger.info).toHaveBeenNthCalledWith(2, { severity: 'success' }, 'Conversion complete');
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs error events at error level', () => {
    const logger = createLogger();
    const sink = new LoggerProgressSink(logger);

    sink.notify({ message: 'Could not load the source', severity: 'error' });

    expect(logger.error).toHaveBeenCalledWith({ severity: 'error' }, 'Could not load the source');
    expect(logger.info).not.toHaveBeenCalled();
  });
});
