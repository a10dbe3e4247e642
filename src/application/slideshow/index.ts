export * from './commands/plan-timeline.command.js';
export * from './commands/render-slideshow.command.js';
export * from './dto/slideshow.dto.js';
export * from './handlers/plan-timeline.handler.js';
export * from './handlers/render-slideshow.handler.js';
export * from './mappers/generator-config.mapper.js';
