import { describe, expect, test, vi } from 'vitest';
import { Clipboard, type HostClipboard } from '../core/commands/clipboard';
import type { Logger } from '../core/log';

function makeLogger(): Logger {
  return { debug: vi.fn(), warn: vi.fn() };
}

describe('Clipboard', () => {
  test('without a host the in-process buffer is used', () => {
    const clipboard = new Clipboard(null, makeLogger());
    expect(clipboard.read()).toBe('');
    clipboard.write('abc');
    expect(clipboard.read()).toBe('abc');
    expect(clipboard.text).toBe('abc');
  });

  test('host text wins when the host has some', () => {
    const host: HostClipboard = { read: () => 'from host', write: () => {} };
    const clipboard = new Clipboard(host, makeLogger());
    clipboard.write('local');
    expect(clipboard.read()).toBe('from host');
  });

  test('an empty host falls back to the buffer', () => {
    const host: HostClipboard = { read: () => null, write: () => {} };
    const clipboard = new Clipboard(host, makeLogger());
    clipboard.write('local');
    expect(clipboard.read()).toBe('local');
  });

  test('host failures are logged and the buffer stays authoritative', () => {
    const logger = makeLogger();
    const host: HostClipboard = {
      read: () => { throw new Error('denied'); },
      write: () => { throw new Error('denied'); },
    };
    const clipboard = new Clipboard(host, logger);
    clipboard.write('kept');
    expect(clipboard.read()).toBe('kept');
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });
});
