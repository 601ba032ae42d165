import { AdmissionRejectedError } from '@runwright/shared';

export const DEFAULT_MAX_CONCURRENT_ALLOCATIONS = 2;
export const DEFAULT_MAX_QUEUED_RUNS = 32;

export type AllocationGateOptions = {
  maxConcurrentAllocations?: number;
  maxQueuedRuns?: number;
};

export type AllocationTicket = {
  /** Resolves once the holder may allocate a workspace. */
  readonly granted: Promise<void>;
  /** Frees the slot, or leaves the queue when the ticket was still waiting. */
  release(): void;
};

export type AllocationGateStats = {
  active: number;
  queued: number;
  maxConcurrentAllocations: number;
  maxQueuedRuns: number;
};

type TicketState = {
  holding: boolean;
  released: boolean;
  grant: () => void;
};

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer; received ${value}.`);
  }
}

/**
 * Bounds how many runs allocate workspaces at once. Waiting runs are granted
 * in FIFO order; once the queue is full, admission fails immediately.
 */
export class AllocationGate {
  readonly maxConcurrentAllocations: number;
  readonly maxQueuedRuns: number;
  private active = 0;
  private readonly queue: TicketState[] = [];

  constructor(options: AllocationGateOptions = {}) {
    this.maxConcurrentAllocations = options.maxConcurrentAllocations ?? DEFAULT_MAX_CONCURRENT_ALLOCATIONS;
    this.maxQueuedRuns = options.maxQueuedRuns ?? DEFAULT_MAX_QUEUED_RUNS;
    assertPositiveInteger('maxConcurrentAllocations', this.maxConcurrentAllocations);
    assertPositiveInteger('maxQueuedRuns', this.maxQueuedRuns);
  }

  /** Throws AdmissionRejectedError when no slot is free and the queue is full. */
  admit(): AllocationTicket {
    if (this.active < this.maxConcurrentAllocations && this.queue.length === 0) {
      this.active += 1;
      return this.createTicket({ holding: true, released: false, grant: () => undefined }, Promise.resolve());
    }

    if (this.queue.length >= this.maxQueuedRuns) {
      throw new AdmissionRejectedError(this.queue.length, this.maxQueuedRuns);
    }

    const state: TicketState = { holding: false, released: false, grant: () => undefined };
    const granted = new Promise<void>(resolve => {
      state.grant = () => {
        state.holding = true;
        resolve();
      };
    });
    this.queue.push(state);
    return this.createTicket(state, granted);
  }

  stats(): AllocationGateStats {
    return {
      active: this.active,
      queued: this.queue.length,
      maxConcurrentAllocations: this.maxConcurrentAllocations,
      maxQueuedRuns: this.maxQueuedRuns,
    };
  }

  private createTicket(state: TicketState, granted: Promise<void>): AllocationTicket {
    return {
      granted,
      release: () => {
        if (state.released) {
          return;
        }

        state.released = true;
        if (state.holding) {
          this.active -= 1;
          this.grantNext();
          return;
        }

        const index = this.queue.indexOf(state);
        if (index >= 0) {
          this.queue.splice(index, 1);
        }
      },
    };
  }

  private grantNext(): void {
    while (this.active < this.maxConcurrentAllocations) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }

      this.active += 1;
      next.grant();
    }
  }
}
