import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { ConversionResult, ConversionResultWriter } from '@domain/stroke-conversion/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { serializeResult } from './result-serializer.js';

const JSON_INDENT = 2;

export class JsonResultWriter implements ConversionResultWriter {
  private readonly logger = createChildLogger({ module: 'JsonResultWriter' });

  public async write(result: ConversionResult, outputPath: string): Promise<string> {
    const resolved = path.resolve(outputPath);
    const document = JSON.stringify(serializeResult(result), null, JSON_INDENT);

    try {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      await fs.writeFile(resolved, document, 'utf8');
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error({ error: cause, outputPath: resolved }, 'Failed to write conversion result');
      throw AppError.fromError(cause, 'stroke-conversion.persistence-failed', {
        outputPath: resolved,
      });
    }

    this.logger.debug({ outputPath: resolved, bytes: Buffer.byteLength(document) }, 'Conversion result written');
    return resolved;
  }
}
