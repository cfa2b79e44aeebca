/**
 * TangentQueue Implementation
 *
 * Bounded FIFO of tangents waiting to be explored.
 *
 * ADMISSION:
 * - relevance < 0.5 AND interest >= 0.7, nothing else gets in
 * - No two queued tangents share the same trimmed, lower-cased text
 * - At capacity the oldest tangent is evicted; push never blocks or throws
 *
 * Every operation is synchronous, so each runs to completion before any
 * other caller (drain, background loop, HTTP handler) touches the buffer.
 */

import type { Logger } from '@/lib/logger.js';
import { silentLogger } from '@/lib/logger.js';
import type { QueueTangentParams, Tangent } from '@/types/index.js';

export const DEFAULT_QUEUE_CAPACITY = 50;

/**
 * Admission thresholds
 */
export const MAX_ADMISSIBLE_RELEVANCE = 0.5; // exclusive
export const MIN_ADMISSIBLE_INTEREST = 0.7; // inclusive

/**
 * TangentQueue interface
 */
export interface TangentQueue {
  /** Returns true iff the tangent was admitted */
  push(params: QueueTangentParams): boolean;
  /** Oldest tangent, or null when empty */
  pop(): Tangent | null;
  /** Copy of the queued tangents, oldest first */
  peekAll(): Tangent[];
  readonly size: number;
  readonly capacity: number;
}

export interface TangentQueueOptions {
  capacity?: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Check the admission predicate
 */
export function isAdmissible(relevance: number, interest: number): boolean {
  return (
    relevance < MAX_ADMISSIBLE_RELEVANCE && interest >= MIN_ADMISSIBLE_INTEREST
  );
}

function dedupKey(text: string): string {
  return text.trim().toLowerCase();
}

/**
 * Create TangentQueue instance
 */
export function createTangentQueue(
  options: TangentQueueOptions = {}
): TangentQueue {
  const capacity = options.capacity ?? DEFAULT_QUEUE_CAPACITY;
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error('Queue capacity must be a positive integer');
  }
  const now = options.now ?? (() => new Date());
  const logger = options.logger ?? silentLogger;

  // Ring buffer: `head` is the oldest slot, `count` the number of live slots
  const slots: Array<Tangent | undefined> = new Array<Tangent | undefined>(
    capacity
  );
  let head = 0;
  let count = 0;

  function slotAt(offset: number): Tangent | undefined {
    return slots[(head + offset) % capacity];
  }

  function isQueued(key: string): boolean {
    for (let i = 0; i < count; i++) {
      const item = slotAt(i);
      if (item !== undefined && dedupKey(item.text) === key) {
        return true;
      }
    }
    return false;
  }

  return {
    push(params: QueueTangentParams): boolean {
      if (!isAdmissible(params.relevance, params.interest)) {
        return false;
      }

      if (isQueued(dedupKey(params.text))) {
        return false;
      }

      const tangent: Tangent = Object.freeze({
        text: params.text,
        seedQuery: params.seedQuery,
        relevance: params.relevance,
        interest: params.interest,
        queuedAt: now(),
      });

      if (count === capacity) {
        const evicted = slots[head];
        slots[head] = undefined;
        head = (head + 1) % capacity;
        count--;
        if (evicted !== undefined) {
          logger.debug('Evicted oldest tangent', {
            tangent: evicted.text.slice(0, 80),
          });
        }
      }

      slots[(head + count) % capacity] = tangent;
      count++;

      logger.info('Tangent queued', {
        interest: params.interest,
        tangent: params.text.slice(0, 80),
      });
      return true;
    },

    pop(): Tangent | null {
      if (count === 0) {
        return null;
      }
      const item = slots[head];
      slots[head] = undefined;
      head = (head + 1) % capacity;
      count--;
      return item ?? null;
    },

    peekAll(): Tangent[] {
      const snapshot: Tangent[] = [];
      for (let i = 0; i < count; i++) {
        const item = slotAt(i);
        if (item !== undefined) {
          snapshot.push(item);
        }
      }
      return snapshot;
    },

    get size(): number {
      return count;
    },

    get capacity(): number {
      return capacity;
    },
  };
}
