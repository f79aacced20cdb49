import type { LogEntry, LogLevel, LogTransport } from '../types.js';

/**
 * Keeps log entries in memory, newest last.
 */
export class MemoryTransport implements LogTransport {
  public readonly name = 'memory';
  private readonly entries: LogEntry[] = [];

  constructor(private readonly maxEntries = 1000) {}

  async log(entry: LogEntry): Promise<void> {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(level?: LogLevel): readonly LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter(e => e.level === level);
  }

  find(message: string): LogEntry | undefined {
    return this.entries.find(e => e.message === message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
