import type { ConversionResult } from '../value-objects/drawing-command.js';

export interface ConversionResultWriter {
  /** Resolves with the absolute path that was written. */
  write(result: ConversionResult, outputPath: string): Promise<string>;
}
