import { describe, expect, test } from 'vitest';
import { CaretBlink } from '../view-model/cursor-state';
import { KeyRepeat } from '../view-model/key-repeat';

describe('KeyRepeat', () => {
  test('fires on the delay frame and every span after it', () => {
    const repeat = new KeyRepeat<string>({ delayMs: 100, spanMs: 50, framesPerSecond: 20 });
    repeat.press('k');
    const fired: number[] = [];
    for (let frame = 1; frame <= 6; frame++) {
      if (repeat.tick() !== null) fired.push(frame);
    }
    expect(fired).toEqual([2, 3, 4, 5, 6]);
  });

  test('nothing fires once released', () => {
    const repeat = new KeyRepeat<string>();
    repeat.press('k');
    repeat.release();
    expect(repeat.held).toBeNull();
    for (let frame = 0; frame < 60; frame++) expect(repeat.tick()).toBeNull();
  });

  test('a new press restarts the delay', () => {
    const repeat = new KeyRepeat<string>({ delayMs: 50, spanMs: 50, framesPerSecond: 60 });
    repeat.press('a');
    repeat.tick();
    repeat.tick();
    repeat.press('b');
    expect(repeat.tick()).toBeNull();
    expect(repeat.tick()).toBeNull();
    expect(repeat.tick()).toBe('b');
  });
});

describe('CaretBlink', () => {
  test('visible for the show frames, hidden for the hide frames', () => {
    const blink = new CaretBlink({ showFrames: 2, hideFrames: 1 });
    expect(blink.visible).toBe(true);
    expect(blink.tick()).toBe(true);
    expect(blink.tick()).toBe(false);
    expect(blink.tick()).toBe(true);
  });

  test('reset shows the caret again', () => {
    const blink = new CaretBlink({ showFrames: 1, hideFrames: 5 });
    blink.tick();
    expect(blink.visible).toBe(false);
    blink.reset();
    expect(blink.visible).toBe(true);
  });

  test('a zero-length cycle keeps the caret visible', () => {
    const blink = new CaretBlink({ showFrames: 0, hideFrames: 0 });
    expect(blink.tick(7)).toBe(true);
  });
});
