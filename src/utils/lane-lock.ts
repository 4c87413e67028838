/**
 * Keyed async critical sections (lane lock)
 *
 * Tasks that share a lane run one at a time in arrival order.
 * Tasks in different lanes run concurrently.
 */

type QueueEntry = {
  /** Runs the task and settles the caller's promise; never rejects */
  start: () => Promise<void>;
  enqueuedAt: number;
};

type LaneState = {
  queue: QueueEntry[];
  active: boolean;
};

export interface LaneLockOptions {
  /** Log a warning when a task waited longer than this before starting */
  warnAfterMs?: number;
  onWarn?: (message: string) => void;
}

export class LaneLock {
  private lanes: Map<string, LaneState> = new Map();
  private warnAfterMs: number;
  private onWarn: ((message: string) => void) | undefined;

  constructor(options: LaneLockOptions = {}) {
    this.warnAfterMs = options.warnAfterMs ?? 5000;
    this.onWarn = options.onWarn;
  }

  /**
   * Run `task` once every earlier task in `lane` has settled.
   * The lane is released when `task` settles, whatever the outcome.
   */
  run<T>(lane: string, task: () => Promise<T>): Promise<T> {
    let state = this.lanes.get(lane);
    if (!state) {
      state = { queue: [], active: false };
      this.lanes.set(lane, state);
    }
    const laneState = state;

    return new Promise<T>((resolve, reject) => {
      laneState.queue.push({
        start: () => Promise.resolve().then(task).then(resolve, reject),
        enqueuedAt: Date.now(),
      });
      this.drain(lane, laneState);
    });
  }

  private drain(lane: string, state: LaneState): void {
    if (state.active) return;
    const entry = state.queue.shift();
    if (!entry) {
      if (this.lanes.get(lane) === state) this.lanes.delete(lane);
      return;
    }

    state.active = true;

    const waitTime = Date.now() - entry.enqueuedAt;
    if (waitTime > this.warnAfterMs && this.onWarn) {
      this.onWarn(`Task waited ${waitTime}ms in lane "${lane}" (warn threshold: ${this.warnAfterMs}ms)`);
    }

    entry.start().finally(() => {
      state.active = false;
      this.drain(lane, state);
    });
  }
}
