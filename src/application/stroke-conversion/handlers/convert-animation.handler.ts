import type {
  ConversionObserver,
  ConversionOutcome,
  ConversionResult,
  ConversionResultWriter,
  StrokeConverterService,
} from '@domain/stroke-conversion/index.js';
import { ConversionJob, ProgressReporter } from '@domain/stroke-conversion/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import type { ConvertAnimationCommand } from '../commands/convert-animation.command.js';
import {
  convertAnimationCommandSchema,
  type ConvertAnimationPayload,
  type ValidatedConvertAnimationPayload,
} from '../dto/convert-animation.dto.js';

export type PersistenceReport =
  | { readonly status: 'skipped' }
  | { readonly status: 'written'; readonly path: string }
  | { readonly status: 'failed'; readonly error: AppError };

export interface ConvertAnimationResult {
  readonly outcome: ConversionOutcome;
  readonly persistence: PersistenceReport;
}

export class ConvertAnimationHandler {
  private readonly logger = createChildLogger({ module: 'ConvertAnimationHandler' });

  public constructor(
    private readonly converter: StrokeConverterService,
    private readonly writer: ConversionResultWriter,
  ) {}

  public async execute(
    command: ConvertAnimationCommand,
    observer: ConversionObserver = {},
  ): Promise<ConvertAnimationResult> {
    const reporter = new ProgressReporter(observer.progress, this.logger);
    const payload = this.validate(command.payload, reporter);
    const job = this.createJob(payload, reporter);

    this.logger.info({ jobId: job.id, parameters: job.parameters }, 'Starting conversion');
    reporter.info('Starting conversion...');

    let outcome: ConversionOutcome;
    try {
      outcome = await this.converter.convert(job, observer);
    } catch (error) {
      const appError = AppError.fromUnknown(error, 'stroke-conversion.failure');
      this.logger.error({ jobId: job.id, error: appError }, 'Conversion failed');
      reporter.error(describeFailure(appError));
      throw appError;
    }

    this.logger.info(
      {
        jobId: job.id,
        frameCount: outcome.result.metadata.frameCount,
        totalCommands: outcome.result.metadata.totalCommands,
        durationMs: outcome.metrics.totalTimeMs,
        cached: outcome.fromCache,
      },
      'Conversion completed',
    );

    const persistence = await this.persist(outcome.result, payload.outputPath, reporter);
    return { outcome, persistence };
  }

  private validate(
    payload: ConvertAnimationPayload,
    reporter: ProgressReporter,
  ): ValidatedConvertAnimationPayload {
    const parsed = convertAnimationCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('stroke-conversion.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid conversion payload received');
      reporter.error(
        `Invalid conversion request: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
          .join('; ')}`,
      );
      throw error;
    }

    return parsed.data;
  }

  private createJob(payload: ValidatedConvertAnimationPayload, reporter: ProgressReporter): ConversionJob {
    try {
      return ConversionJob.create({
        id: payload.id,
        source: payload.source,
        parameters: payload.parameters,
        createdAt: new Date(),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      reporter.error(`Invalid conversion request: ${reason}`);
      throw AppError.validation('stroke-conversion.invalid-payload', { reason });
    }
  }

  private async persist(
    result: ConversionResult,
    outputPath: string | undefined,
    reporter: ProgressReporter,
  ): Promise<PersistenceReport> {
    const { frameCount, totalCommands } = result.metadata;

    if (outputPath === undefined) {
      reporter.success(
        `Conversion complete: ${frameCount} frame(s), ${totalCommands} command(s) in total.`,
      );
      return { status: 'skipped' };
    }

    try {
      const written = await this.writer.write(result, outputPath);
      reporter.success(
        `Conversion complete! '${written}' written with ${frameCount} frame(s) and ${totalCommands} command(s) in total.`,
      );
      return { status: 'written', path: written };
    } catch (error) {
      const appError = AppError.fromUnknown(error, 'stroke-conversion.persistence-failed');
      this.logger.error({ outputPath, error: appError }, 'Persisting conversion result failed');
      reporter.error(`Could not save the result to '${outputPath}': ${appError.message}`);
      return { status: 'failed', error: appError };
    }
  }
}

function describeFailure(error: AppError): string {
  switch (error.code) {
    case 'stroke-conversion.source-unreadable':
      return `Could not load the source: ${error.message}`;
    case 'stroke-conversion.cancelled':
      return 'Conversion cancelled.';
    default:
      return `Unexpected error during conversion: ${error.message}`;
  }
}
