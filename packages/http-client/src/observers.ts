import type { AttemptObserver, AttemptRecord } from './types.js';

/**
 * Collects attempt records in memory. Useful for tests and for surfacing an
 * attempt count on proxied responses.
 */
export class AttemptRecorder {
  private readonly records: AttemptRecord[] = [];

  readonly observer: AttemptObserver = record => {
    this.records.push(record);
  };

  get count(): number {
    return this.records.length;
  }

  all(): readonly AttemptRecord[] {
    return [...this.records];
  }

  last(): AttemptRecord | undefined {
    return this.records[this.records.length - 1];
  }

  totalDelayMs(): number {
    return this.records.reduce((sum, record) => sum + (record.delayMs ?? 0), 0);
  }

  clear(): void {
    this.records.length = 0;
  }
}
