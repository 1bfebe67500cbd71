import { CALLBACK_EVENTS, keyboardFor, MENU_CANCEL, MENU_CREATE_DOCUMENT } from './telegram.keyboards';

describe('keyboardFor', () => {
  it('should build a resized reply keyboard for the main menu', () => {
    expect(keyboardFor('main_menu')).toEqual({
      keyboard: [[MENU_CREATE_DOCUMENT, MENU_CANCEL]],
      resize_keyboard: true,
    });
  });

  it('should offer skip and unknown answers while filling a field', () => {
    const markup = keyboardFor('variable');
    const data = 'inline_keyboard' in markup
      ? markup.inline_keyboard.flat().map((button) => ('callback_data' in button ? button.callback_data : ''))
      : [];

    expect(data).toEqual(['flow:skip', 'flow:dont_know', 'flow:cancel']);
  });

  it('should only route callback data the keyboards emit', () => {
    const emitted = new Set<string>();
    for (const kind of ['clarification', 'variable', 'confirmation', 'cancel_only'] as const) {
      const markup = keyboardFor(kind);
      if (!('inline_keyboard' in markup)) continue;
      for (const button of markup.inline_keyboard.flat()) {
        if ('callback_data' in button) emitted.add(button.callback_data);
      }
    }

    expect([...emitted].sort()).toEqual(Object.keys(CALLBACK_EVENTS).sort());
  });
});
