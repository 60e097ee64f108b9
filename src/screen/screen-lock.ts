/**
 * Single-owner read/write discipline for a screen buffer.
 *
 * Every buffer operation is synchronous, so nothing ever waits on this lock.
 * It exists to reject re-entry: a write started while any hold is active, or
 * a read started during a write, is a caller defect and throws.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;

  constructor(private readonly name = 'screen buffer') {}

  read<T>(fn: () => T): T {
    if (this.writing) {
      throw new Error(`${this.name}: read attempted while a write is in progress`);
    }
    this.readers += 1;
    try {
      return fn();
    } finally {
      this.readers -= 1;
    }
  }

  write<T>(fn: () => T): T {
    if (this.writing) {
      throw new Error(`${this.name}: nested write attempted`);
    }
    if (this.readers > 0) {
      throw new Error(`${this.name}: write attempted while ${this.readers} read(s) are active`);
    }
    this.writing = true;
    try {
      return fn();
    } finally {
      this.writing = false;
    }
  }

  isHeld(): boolean {
    return this.writing || this.readers > 0;
  }
}
