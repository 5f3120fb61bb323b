/**
 * Runs a task one invocation at a time. Triggers that arrive while a run is
 * in flight collapse into a single pending run, started as soon as the
 * current one settles.
 */
export class SerialRunner {
  private running: Promise<void> | null = null;
  private pending = false;
  private closed = false;

  /**
   * @param onError receives errors thrown by the task; the runner keeps going
   */
  constructor(
    private readonly task: () => Promise<void>,
    private readonly onError: (err: unknown) => void,
  ) {}

  get busy(): boolean {
    return this.running !== null;
  }

  trigger(): void {
    if (this.closed) return;
    if (this.running) {
      this.pending = true;
      return;
    }
    this.running = this.loop();
  }

  /** Resolves once no run is in flight or pending. */
  async idle(): Promise<void> {
    while (this.running) await this.running;
  }

  /** Drop any pending run, refuse new triggers, and wait for the in-flight one. */
  async close(): Promise<void> {
    this.closed = true;
    this.pending = false;
    await this.idle();
  }

  private async loop(): Promise<void> {
    try {
      do {
        this.pending = false;
        try {
          await this.task();
        } catch (err) {
          this.onError(err);
        }
      } while (this.pending && !this.closed);
    } finally {
      this.running = null;
    }
  }
}
