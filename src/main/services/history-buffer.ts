import { ErrorCode, MonitorError } from '../../shared/types/errors';

/**
 * HistoryBuffer — fixed-length rolling window of samples backing a sparkline.
 *
 * Pre-filled at construction so its length never changes: every push evicts
 * the oldest sample. Backed by a ring, so push is O(1) with no reallocation.
 */
export class HistoryBuffer {
  readonly capacity: number;
  private readonly samples: number[];
  /** Slot holding the oldest sample, i.e. the next one overwritten */
  private head = 0;

  constructor(capacity: number, fill = 0) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new MonitorError(`History capacity must be a non-negative integer, got ${capacity}`, ErrorCode.INVALID_ARGUMENT, {
        context: { capacity },
      });
    }
    this.capacity = capacity;
    this.samples = new Array<number>(capacity).fill(fill);
  }

  get length(): number {
    return this.capacity;
  }

  push(value: number): void {
    if (this.capacity === 0) return;
    this.samples[this.head] = value;
    this.head = (this.head + 1) % this.capacity;
  }

  /** Most recent sample; 0 for a zero-capacity buffer. */
  latest(): number {
    if (this.capacity === 0) return 0;
    return this.samples[(this.head + this.capacity - 1) % this.capacity];
  }

  /** Samples oldest first, as a fresh array. */
  values(): number[] {
    return [...this.samples.slice(this.head), ...this.samples.slice(0, this.head)];
  }
}
