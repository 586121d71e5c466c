export interface PollWorker {
  runCycle(): Promise<unknown>;
  close(): void;
}

export const DEFAULT_JOIN_TIMEOUT_MS = 5000;

/**
 * Runs cycles back to back with a fixed pause in between. Stop requests are
 * honoured at cycle boundaries; the pause itself is interruptible.
 */
export class PollingLoop {
  private running = false;
  private loop?: Promise<void>;
  private wakeUp?: () => void;

  constructor(private worker: PollWorker, private intervalMs: number) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    console.log(`🔁 Starting summariser loop with interval ${(this.intervalMs / 1000).toFixed(1)}s`);
    this.loop = this.run();
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        await this.worker.runCycle();
      } catch (error) {
        console.error('❌ Unexpected error while processing unread channels:', error);
      }
      if (!this.running) break;
      await this.pause();
    }
  }

  private pause(): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wakeUp = undefined;
        resolve();
      }, this.intervalMs);
      this.wakeUp = () => {
        clearTimeout(timer);
        this.wakeUp = undefined;
        resolve();
      };
    });
  }

  /**
   * Ask the loop to finish, wait up to `joinTimeoutMs` for the in-flight
   * cycle, then release the worker's resources. Resolves to whether the
   * loop ended within the timeout.
   */
  async stop(joinTimeoutMs: number = DEFAULT_JOIN_TIMEOUT_MS): Promise<boolean> {
    this.running = false;
    this.wakeUp?.();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(false), joinTimeoutMs);
    });
    const finished = this.loop ? this.loop.then(() => true) : Promise.resolve(true);

    try {
      const joined = await Promise.race([finished, timedOut]);
      if (!joined) console.warn('⚠️ Poll cycle did not finish in time; abandoning it');
      return joined;
    } finally {
      clearTimeout(timer);
      this.loop = undefined;
      this.worker.close();
      console.log('🛑 Summariser loop stopped');
    }
  }
}
