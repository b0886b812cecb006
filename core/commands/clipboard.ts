/**
 * Clipboard: an in-process buffer, mirrored to the host clipboard when one
 * is available.
 *
 * The in-process buffer is the source of truth. Host reads and writes are
 * best-effort: a host that throws (no permission, no clipboard on this
 * platform) is logged and otherwise ignored.
 */

import { type Logger, consoleLogger } from '../log';

export interface HostClipboard {
  /** Current host clipboard text, or null when it holds no text. */
  read(): string | null;
  write(text: string): void;
}

export class Clipboard {
  private _text: string = '';
  private host: HostClipboard | null;
  private logger: Logger;

  constructor(host: HostClipboard | null = null, logger: Logger = consoleLogger) {
    this.host = host;
    this.logger = logger;
  }

  /** The in-process buffer. */
  get text(): string {
    return this._text;
  }

  write(text: string): void {
    this._text = text;
    if (!this.host) return;
    try {
      this.host.write(text);
    } catch (err) {
      this.logger.warn('host clipboard write failed; keeping in-process copy', err);
    }
  }

  /** Host text when the host has some, otherwise the in-process buffer. */
  read(): string {
    if (!this.host) return this._text;
    try {
      const hostText = this.host.read();
      if (hostText !== null && hostText !== '') return hostText;
    } catch (err) {
      this.logger.warn('host clipboard read failed; using in-process copy', err);
    }
    return this._text;
  }
}
