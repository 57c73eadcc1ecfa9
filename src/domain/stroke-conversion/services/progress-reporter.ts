import type { Logger } from 'pino';

import type { ProgressEvent, ProgressSeverity, ProgressSink } from '../contracts/progress-sink.js';

/**
 * Delivers progress events to an optional sink. Without a sink, events go to the
 * logger instead; a sink that throws is logged and otherwise ignored.
 */
export class ProgressReporter {
  public constructor(
    private readonly sink: ProgressSink | undefined,
    private readonly logger: Logger,
  ) {}

  public info(message: string): void {
    this.emit({ message, severity: 'info' });
  }

  public success(message: string): void {
    this.emit({ message, severity: 'success' });
  }

  public error(message: string): void {
    this.emit({ message, severity: 'error' });
  }

  private emit(event: ProgressEvent): void {
    if (!this.sink) {
      this.log(event.severity, event.message);
      return;
    }

    try {
      this.sink.notify(event);
    } catch (error) {
      this.logger.warn({ error, event }, 'Progress sink rejected a notification');
    }
  }

  private log(severity: ProgressSeverity, message: string): void {
    if (severity === 'error') {
      this.logger.error(message);
      return;
    }

    this.logger.info({ severity }, message);
  }
}
