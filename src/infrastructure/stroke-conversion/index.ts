export * from './cache/memory-cache.js';
export * from './decoders/animation-frame-decoder.js';
export * from './persistence/json-result-writer.js';
export * from './persistence/result-serializer.js';
export * from './preview/stroke-preview-renderer.js';
export * from './progress/logger-progress-sink.js';
export * from './scanline-stroke-converter.service.js';
