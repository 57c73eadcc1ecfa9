import type { Logger } from 'pino';

import type { ProgressEvent, ProgressSink } from '@domain/stroke-conversion/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

export class LoggerProgressSink implements ProgressSink {
  public constructor(
    private readonly logger: Logger = createChildLogger({ module: 'progress' }),
  ) {}

  public notify(event: ProgressEvent): void {
    if (event.severity === 'error') {
      this.logger.error({ severity: event.severity }, event.message);
      return;
    }

    this.logger.info({ severity: event.severity }, event.message);
  }
}
