export * from './commands/create-slideshow.command.js';
export * from './dto/create-slideshow.dto.js';
export * from './handlers/create-slideshow.handler.js';
