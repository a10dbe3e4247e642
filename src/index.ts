export * from './domain/slideshow/index.js';
export * from './application/slideshow/index.js';
export * from './infrastructure/slideshow/index.js';
export { AppError } from './shared/errors/app-error.js';
export { ReelError } from './shared/errors/base.error.js';
