export * from './cache/memory-cache.js';
export * from './encoder/ffmpeg-video-encoder.js';
export * from './image-pool/directory-image-pool.js';
export * from './image-processing/canvas-image-processor.js';
export * from './materializer/frame-sequence-materializer.js';
export * from './materializer/materializer-factory.js';
export * from './resolvers/direct-image-resolver.js';
export * from './resolvers/disk-cached-image-resolver.js';
