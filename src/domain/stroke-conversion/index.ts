export * from './contracts/conversion-result-writer.js';
export * from './contracts/frame-decoder.js';
export * from './contracts/progress-sink.js';
export * from './contracts/stroke-converter-service.js';
export * from './entities/conversion-job.js';
export * from './services/frame-aggregator.js';
export * from './services/frame-normalizer.js';
export * from './services/progress-reporter.js';
export * from './services/scanline-encoder.js';
export * from './value-objects/animation-source.js';
export * from './value-objects/conversion-parameters.js';
export * from './value-objects/drawing-command.js';
