import { describe, expect, test, vi } from 'vitest';
import { FixedAdvanceMetrics } from '../native/font-metrics';
import { TextArea } from '../view-model/text-area';
import type { TextAreaOptions } from '../view-model/options';
import { EditorSession } from '../view-model/editor-session';
import type { KeyDownEvent, SpecialKey } from '../core/commands/keys';
import { ConfigurationError } from '../core/errors';
import { type Logger, silentLogger } from '../core/log';

const metrics = new FixedAdvanceMetrics({ advance: 10, ascent: 12, descent: 4 });

function makeArea(options: Partial<TextAreaOptions> = {}) {
  return new TextArea(metrics, { width: 50, height: 32, edit: true, ...options });
}

function makeSession() {
  return new EditorSession({}, null, silentLogger);
}

function char(ch: string, shift: boolean = false): KeyDownEvent {
  return { code: ch.codePointAt(0) ?? 0, special: null, shift };
}

function key(special: SpecialKey, shift: boolean = false): KeyDownEvent {
  return { code: 0, special, shift };
}

function type(session: EditorSession, text: string) {
  for (const ch of text) {
    session.keyDown(char(ch));
    session.keyUp({ code: ch.codePointAt(0) ?? 0, special: null });
  }
}

describe('EditorSession', () => {
  describe('focus', () => {
    test('an area without a size cannot take focus', () => {
      const session = makeSession();
      expect(() => session.focus(new TextArea(metrics, { text: 'x' }))).toThrow(ConfigurationError);
      expect(session.focused).toBeNull();
    });

    test('focusing another area blurs the first as escaped', () => {
      const session = makeSession();
      const first = makeArea();
      const second = makeArea();
      const finished = vi.fn();
      session.onEditingFinished(finished);

      session.focus(first);
      type(session, 'hi');
      session.focus(second);

      expect(session.focused).toBe(second);
      expect(finished).toHaveBeenCalledTimes(1);
      expect(finished).toHaveBeenCalledWith(first, true);
    });

    test('escape finishes editing once, and only after a change', () => {
      const session = makeSession();
      const area = makeArea();
      const finished = vi.fn();
      session.onEditingFinished(finished);

      session.focus(area);
      session.keyDown(key('Escape'));
      expect(finished).not.toHaveBeenCalled();
      expect(session.focused).toBeNull();

      session.focus(area);
      type(session, 'a');
      session.keyDown(key('Escape'));
      session.blur();
      expect(finished).toHaveBeenCalledTimes(1);
      expect(finished).toHaveBeenCalledWith(area, true);
    });

    test('enter in a one-line area is go', () => {
      const session = makeSession();
      const area = makeArea({ oneLine: true });
      const finished = vi.fn();
      session.onEditingFinished(finished);

      session.focus(area);
      type(session, 'ok');
      session.keyDown(key('Enter'));
      expect(session.focused).toBeNull();
      expect(area.text).toBe('ok');
      expect(finished).toHaveBeenCalledWith(area, false);
    });

    test('blur collapses the selection to the caret', () => {
      const session = makeSession();
      const area = makeArea({ text: 'abc' });
      session.focus(area);
      area.setCaret(2, true);
      session.blur();
      expect(area.selection).toEqual({ anchor: 2, moving: 2 });
    });

    test('unsubscribed listeners are not called', () => {
      const session = makeSession();
      const area = makeArea();
      const finished = vi.fn();
      const unsubscribe = session.onEditingFinished(finished);
      unsubscribe();
      session.focus(area);
      type(session, 'a');
      session.blur('go');
      expect(finished).not.toHaveBeenCalled();
    });

    test('focus changes are logged at debug', () => {
      const logger: Logger = { debug: vi.fn(), warn: vi.fn() };
      const session = new EditorSession({}, null, logger);
      session.focus(makeArea());
      expect(logger.debug).toHaveBeenCalledWith('focus acquired', { caret: 0 });
    });
  });

  describe('keyboard', () => {
    test('character keys type lowercase unless shifted', () => {
      const session = makeSession();
      const area = makeArea();
      session.focus(area);
      session.keyDown({ code: 0x41, special: null, shift: false });
      session.keyDown({ code: 0x41, special: null, shift: true });
      session.keyDown({ code: 0x41, special: null, text: 'é', shift: false });
      expect(area.text).toBe('aAé');
    });

    test('enter inserts a newline and tab two spaces', () => {
      const session = makeSession();
      const area = makeArea();
      session.focus(area);
      session.keyDown(key('Tab'));
      session.keyDown(key('Enter'));
      expect(area.text).toBe('  \n');
    });

    test('shift + enter is go in a multi-line area', () => {
      const session = makeSession();
      const area = makeArea();
      session.focus(area);
      session.keyDown(key('Enter', true));
      expect(session.focused).toBeNull();
      expect(area.text).toBe('');
    });

    test('keys do nothing in an area that is not editable', () => {
      const session = makeSession();
      const area = makeArea({ text: 'abc', edit: false, scroll: true });
      session.focus(area);
      expect(session.keyDown(char('x'))).toBe(false);
      expect(area.text).toBe('abc');
    });

    test('held shift extends the selection', () => {
      const session = makeSession();
      const area = makeArea({ text: 'abc' });
      session.focus(area);
      session.keyDown(key('Shift'));
      session.keyDown(key('Right'));
      session.keyDown(key('Right'));
      expect(session.modifiers.Shift).toBe(true);
      expect(area.selection).toEqual({ anchor: 0, moving: 2 });

      session.keyUp({ code: 0, special: 'Shift' });
      session.keyDown(key('Right'));
      expect(area.selection).toEqual({ anchor: 3, moving: 3 });
    });

    test('ctrl shortcuts select, copy and paste', () => {
      const session = makeSession();
      const area = makeArea({ text: 'abc' });
      session.focus(area);
      session.keyDown(key('Ctrl'));
      session.keyDown(char('a'));
      session.keyDown(char('c'));
      expect(session.clipboard.text).toBe('abc');

      session.keyUp({ code: 0, special: 'Ctrl' });
      session.keyDown(key('End'));
      session.keyDown(key('Ctrl'));
      session.keyDown(char('v'));
      expect(area.text).toBe('abcabc');
    });

    test('ctrl with a letter that is not a shortcut types nothing', () => {
      const session = makeSession();
      const area = makeArea({ text: 'abc' });
      session.focus(area);
      session.keyDown(key('Ctrl'));
      expect(session.keyDown(char('q'))).toBe(false);
      expect(area.text).toBe('abc');
    });

    test('undo and redo keys', () => {
      const session = makeSession();
      const area = makeArea();
      session.focus(area);
      type(session, 'ab');
      session.keyDown(key('Undo'));
      expect(area.text).toBe('a');
      session.keyDown(key('Redo'));
      expect(area.text).toBe('ab');
    });

    test('paste prefers the host clipboard', () => {
      const host = { read: () => 'zz', write: vi.fn() };
      const session = new EditorSession({}, host, silentLogger);
      const area = makeArea({ text: 'ab' });
      session.focus(area);
      area.selectAll();
      session.keyDown(key('Copy'));
      expect(host.write).toHaveBeenCalledWith('ab');
      session.keyDown(key('Paste'));
      expect(area.text).toBe('zz');
    });
  });

  describe('tick', () => {
    test('returns null without focus', () => {
      expect(makeSession().tick()).toBeNull();
    });

    test('a held key repeats after the delay, then every span', () => {
      const session = makeSession();
      const area = makeArea();
      session.focus(area);
      session.keyDown(char('x'));
      expect(area.text).toBe('x');

      session.tick(29);
      expect(area.text).toBe('x');
      session.tick(1);
      expect(area.text).toBe('xx');
      session.tick(2);
      expect(area.text).toBe('xx');
      session.tick(1);
      expect(area.text).toBe('xxx');

      session.keyUp({ code: 0x78, special: null });
      session.tick(10);
      expect(area.text).toBe('xxx');
    });

    test('the caret blinks with the configured frame counts', () => {
      const session = new EditorSession({ caretShowFrames: 3, caretHideFrames: 2 }, null, silentLogger);
      session.focus(makeArea());
      expect(session.tick(2)?.caretVisible).toBe(true);
      expect(session.tick(1)?.caretVisible).toBe(false);
      expect(session.tick(1)?.caretVisible).toBe(false);
      expect(session.tick(1)?.caretVisible).toBe(true);
    });

    test('a key press restarts the blink cycle visible', () => {
      const session = new EditorSession({ caretShowFrames: 3, caretHideFrames: 2 }, null, silentLogger);
      session.focus(makeArea());
      expect(session.tick(3)?.caretVisible).toBe(false);
      session.keyDown(key('Left'));
      expect(session.tick(1)?.caretVisible).toBe(true);
    });

    test('reports the scroll offset', () => {
      const session = makeSession();
      const area = makeArea({ text: 'a\nb\nc\nd\ne\nf' });
      session.focus(area);
      area.scrollTo(0, 20, 2);
      expect(session.tick(1)).toEqual({ caretVisible: true, scrollX: 0, scrollY: 10 });
      expect(session.tick(1)?.scrollY).toBe(20);
    });
  });

  describe('pointer', () => {
    test('mouse press places the caret and dragging selects', () => {
      const session = makeSession();
      const area = makeArea({ text: 'ab cd ef', wholeWords: true });
      expect(session.pointerDown(area, { x: 25, y: 5, touch: false })).toBe(true);
      expect(session.focused).toBe(area);
      expect(area.caret).toBe(3);

      session.pointerMove({ x: 15, y: 20, touch: false });
      session.pointerUp({ x: 15, y: 20, touch: false });
      expect(area.selection).toEqual({ anchor: 3, moving: 8 });
      expect(area.selectedText).toBe('cd ef');
    });

    test('presses outside the visible window are ignored', () => {
      const session = makeSession();
      const area = makeArea({ text: 'abc' });
      expect(session.pointerDown(area, { x: 60, y: 5, touch: false })).toBe(false);
      expect(session.focused).toBeNull();
    });

    test('dragging a scroll-only area scrolls it', () => {
      const session = makeSession();
      const area = makeArea({ text: 'a\nb\nc\nd\ne\nf\ng\nh\ni\nj', edit: false, scroll: true });
      session.pointerDown(area, { x: 10, y: 30, touch: true });
      session.pointerMove({ x: 10, y: 10, touch: true });
      session.pointerUp({ x: 10, y: 10, touch: true });
      expect(area.viewport.anchorY).toBe(20);
      expect(session.tick()?.scrollY).toBe(20);
      expect(session.tick()?.caretVisible).toBe(false);
    });

    test('releasing a touch on an editable area places the caret', () => {
      const session = makeSession();
      const area = makeArea({ text: 'a\nb\nc' });
      session.pointerDown(area, { x: 5, y: 5, touch: true });
      expect(area.caret).toBe(0);
      session.pointerUp({ x: 4, y: 20, touch: true });
      expect(area.caret).toBe(2);
      expect(area.hasSelection).toBe(false);
    });
  });
});
