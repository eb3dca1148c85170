import {
  Logs,
  SCHEDULER_ERROR_RUNNING_PASS,
  SCHEDULER_PASS_DEFERRED,
  SCHEDULER_STARTED,
  SCHEDULER_STOPPED,
  SCHEDULER_STOPPING,
} from '../@log/index.js';

/**
 * Longest delay `setTimeout` takes before it fires right away.
 */
const TIMER_DELAY_MAX = 2 ** 31 - 1;

export type SchedulerPass = () => Promise<unknown>;

/**
 * Runs `pass` right away and then every `interval` milliseconds, measured
 * from the start of the previous pass. A pass outlasting the interval
 * defers the next one until it completes, passes never overlap.
 */
export class Scheduler {
  private stopped = true;

  /**
   * Bumped on every `start()` and `stop()`, a run or timer from an older
   * generation does nothing.
   */
  private generation = 0;

  private timer: NodeJS.Timeout | undefined;

  private passPromise: Promise<void> | undefined;

  constructor(
    private pass: SchedulerPass,
    readonly interval: number,
  ) {}

  get running(): boolean {
    return this.passPromise !== undefined;
  }

  start(): void {
    if (!this.stopped) {
      return;
    }

    this.stopped = false;

    const generation = ++this.generation;

    Logs.info('scheduler', SCHEDULER_STARTED(this.interval));

    if (this.passPromise) {
      // Restarted while a stop is still waiting for its pass.
      void this.passPromise.then(() => this.run(generation));
    } else {
      this.run(generation);
    }
  }

  /**
   * Cancels the next pass and resolves once the pass in flight, if any, has
   * completed.
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }

    this.stopped = true;
    this.generation++;

    clearTimeout(this.timer);
    this.timer = undefined;

    if (this.passPromise) {
      Logs.info('scheduler', SCHEDULER_STOPPING);
      await this.passPromise;
    }

    if (this.stopped) {
      Logs.info('scheduler', SCHEDULER_STOPPED);
    }
  }

  private run(generation: number): void {
    if (this.stopped || generation !== this.generation) {
      return;
    }

    const startedAt = Date.now();

    this.passPromise = Promise.resolve()
      .then(() => this.pass())
      .then(
        () => {},
        error => {
          Logs.error('scheduler', SCHEDULER_ERROR_RUNNING_PASS(error));
          Logs.debug('scheduler', error);
        },
      )
      .finally(() => {
        this.passPromise = undefined;

        if (this.stopped || generation !== this.generation) {
          return;
        }

        const elapsed = Date.now() - startedAt;

        if (elapsed > this.interval) {
          Logs.debug(
            'scheduler',
            SCHEDULER_PASS_DEFERRED(elapsed - this.interval),
          );
        }

        this.wait(generation, Math.max(this.interval - elapsed, 0));
      });
  }

  private wait(generation: number, delay: number): void {
    const chunk = Math.min(delay, TIMER_DELAY_MAX);

    this.timer = setTimeout(() => {
      if (delay > chunk) {
        this.wait(generation, delay - chunk);
      } else {
        this.run(generation);
      }
    }, chunk);
  }
}
