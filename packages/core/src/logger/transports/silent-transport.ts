/**
 * Silent Transport
 *
 * A no-op transport that discards all log entries.
 * Used by tests and by agents embedded in another process.
 */

import type { LoggerTransport, LogEntry } from '../types.js';

export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}
}
