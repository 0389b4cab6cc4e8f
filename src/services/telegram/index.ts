export { createBot } from './bot';
export type { BotOptions } from './bot';
export type { BotSettings } from './handlers';
export { getMainMenuKeyboard } from './buttons';
