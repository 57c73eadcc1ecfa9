import { performance } from 'node:perf_hooks';

import {
  aggregateFrames,
  describeSource,
  ProgressReporter,
  type ConversionJob,
  type ConversionObserver,
  type ConversionOutcome,
  type ConversionResult,
  type FrameDecoder,
  type StrokeConverterService,
} from '@domain/stroke-conversion/index.js';

import { env } from '@/shared/config/env.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { MemoryCache } from './cache/memory-cache.js';
import { AnimationFrameDecoder } from './decoders/animation-frame-decoder.js';

interface ScanlineStrokeConverterOptions {
  readonly decoder?: FrameDecoder;
  readonly cacheTtlMs?: number;
  readonly cacheEntries?: number;
}

export class ScanlineStrokeConverterService implements StrokeConverterService {
  private readonly logger = createChildLogger({ module: 'ScanlineStrokeConverterService' });

  private readonly cache: MemoryCache<ConversionResult>;

  private readonly decoder: FrameDecoder;

  public constructor(options: ScanlineStrokeConverterOptions = {}) {
    this.decoder = options.decoder ?? new AnimationFrameDecoder();
    this.cache = new MemoryCache<ConversionResult>({
      maxEntries: options.cacheEntries ?? env.CONVERTER_CACHE_ENTRIES,
      ttlMs: options.cacheTtlMs ?? env.CONVERTER_CACHE_TTL_MS,
    });
  }

  /** Drops every cached result, e.g. after the source files changed on disk. */
  public clearCache(): void {
    this.cache.clear();
  }

  public async convert(job: ConversionJob, observer: ConversionObserver = {}): Promise<ConversionOutcome> {
    const startedAt = performance.now();
    const reporter = new ProgressReporter(observer.progress, this.logger.child({ jobId: job.id }));

    reporter.info(`Loading source from ${describeSource(job.source)}...`);

    const decodeStarted = performance.now();
    const animation = await this.decoder.decode(job.source);
    const decodeTimeMs = performance.now() - decodeStarted;

    const cacheKey = job.cacheKey(animation.metadata.fingerprint);
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.logger.debug(
        { jobId: job.id, cacheKey, cache: this.cache.stats() },
        'Returning cached conversion',
      );
      reporter.info('Source already converted with these parameters; reusing the cached result.');

      return {
        fromCache: true,
        result: cached.value,
        metrics: {
          decodeTimeMs,
          encodeTimeMs: 0,
          totalTimeMs: performance.now() - startedAt,
          averageFrameEncodingMs: 0,
        },
      };
    }

    const encodeStarted = performance.now();
    const result = aggregateFrames(animation, job.parameters, {
      reporter,
      signal: observer.signal,
    });
    const encodeTimeMs = performance.now() - encodeStarted;

    this.cache.set(cacheKey, result);

    this.logger.debug(
      {
        jobId: job.id,
        frameCount: result.metadata.frameCount,
        totalCommands: result.metadata.totalCommands,
        cache: this.cache.stats(),
      },
      'Conversion finished',
    );

    return {
      fromCache: false,
      result,
      metrics: {
        decodeTimeMs,
        encodeTimeMs,
        totalTimeMs: performance.now() - startedAt,
        averageFrameEncodingMs: result.metadata.frameCount
          ? encodeTimeMs / result.metadata.frameCount
          : 0,
      },
    } satisfies ConversionOutcome;
  }
}
