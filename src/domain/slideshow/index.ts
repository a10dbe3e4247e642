export * from './contracts/frame-materializer.js';
export * from './contracts/image-pool.js';
export * from './contracts/image-resolver.js';
export * from './contracts/video-encoder.js';
export * from './errors/sequence-errors.js';
export * from './services/random-source.js';
export * from './services/sequence-generator.js';
export * from './services/timeline-planning.js';
export * from './value-objects/generator-config.js';
export * from './value-objects/timeline.js';
