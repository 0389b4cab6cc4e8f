import { InlineKeyboard } from 'grammy';

export const MenuAction = {
  HISTORY: 'history',
  SUMMARY_ALL: 'summary_all',
  SUMMARY_TODAY: 'summary_today',
  EXPORT: 'export',
  CATEGORIES: 'categories',
  HELP: 'help',
} as const;

export type MenuAction = (typeof MenuAction)[keyof typeof MenuAction];

export function isMenuAction(data: string): data is MenuAction {
  return Object.values<string>(MenuAction).includes(data);
}

export function getMainMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('📜 History', MenuAction.HISTORY)
    .text('📊 Summary', MenuAction.SUMMARY_ALL)
    .row()
    .text('📅 Today', MenuAction.SUMMARY_TODAY)
    .text('📤 Export', MenuAction.EXPORT)
    .row()
    .text('🏷️ Categories', MenuAction.CATEGORIES)
    .text('❓ Help', MenuAction.HELP);
}
