import { Markup } from 'telegraf';
import type { ExternalEvent, KeyboardKind } from '../conversation/conversation.types';

export const MENU_CREATE_DOCUMENT = '✍️ Создать документ';
export const MENU_CANCEL = '❌ Отмена';

export const CALLBACK_EVENTS: Record<string, ExternalEvent> = {
  'flow:skip': { type: 'skip' },
  'flow:dont_know': { type: 'dont_know' },
  'flow:confirm': { type: 'confirm' },
  'flow:add_terms': { type: 'add_terms' },
  'flow:cancel': { type: 'cancel' },
};

const cancelButton = () => Markup.button.callback('❌ Отмена', 'flow:cancel');

export function keyboardFor(kind: KeyboardKind) {
  switch (kind) {
    case 'main_menu':
      return Markup.keyboard([[MENU_CREATE_DOCUMENT, MENU_CANCEL]]).resize().reply_markup;
    case 'clarification':
      return Markup.inlineKeyboard([
        [Markup.button.callback('🤷 Не знаю', 'flow:dont_know')],
        [cancelButton()],
      ]).reply_markup;
    case 'variable':
      return Markup.inlineKeyboard([
        [
          Markup.button.callback('⏭ Пропустить', 'flow:skip'),
          Markup.button.callback('🤷 Не знаю', 'flow:dont_know'),
        ],
        [cancelButton()],
      ]).reply_markup;
    case 'confirmation':
      return Markup.inlineKeyboard([
        [Markup.button.callback('✅ Подтвердить', 'flow:confirm')],
        [Markup.button.callback('➕ Добавить условия', 'flow:add_terms')],
        [cancelButton()],
      ]).reply_markup;
    case 'cancel_only':
      return Markup.inlineKeyboard([[cancelButton()]]).reply_markup;
  }
}
