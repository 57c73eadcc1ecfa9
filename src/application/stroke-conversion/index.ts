export * from './commands/convert-animation.command.js';
export * from './dto/convert-animation.dto.js';
export * from './handlers/convert-animation.handler.js';
