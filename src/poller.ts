import type { Logger } from "pino";
import { TelegramUpdate } from "./types/telegram";

export interface UpdateSource {
  getUpdates(offset: number | undefined, timeoutSeconds: number): Promise<TelegramUpdate[]>;
}

export type UpdatePollerOptions = {
  timeoutSeconds?: number;
  maxBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Long-polling loop over getUpdates. Each update is handled before the next one is read. */
export class UpdatePoller {
  private offset: number | undefined;
  private running = false;
  private failures = 0;
  private readonly timeoutSeconds: number;
  private readonly maxBackoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly source: UpdateSource,
    private readonly handle: (update: TelegramUpdate) => Promise<void>,
    private readonly logger: Logger,
    options: UpdatePollerOptions = {},
  ) {
    this.timeoutSeconds = options.timeoutSeconds ?? 30;
    this.maxBackoffMs = options.maxBackoffMs ?? 30000;
    this.sleep = options.sleep ?? wait;
  }

  get nextOffset() {
    return this.offset;
  }

  get isRunning() {
    return this.running;
  }

  /** One getUpdates round trip; returns how many updates were handled. */
  async pollOnce(): Promise<number> {
    const updates = await this.source.getUpdates(this.offset, this.timeoutSeconds);
    for (const update of updates) {
      // Advance first so an update that keeps failing is not fetched again.
      this.offset = update.update_id + 1;
      await this.handle(update);
    }
    return updates.length;
  }

  backoffMs(attempt: number) {
    return Math.min(1000 * Math.pow(2, attempt), this.maxBackoffMs); // Exponential backoff
  }

  async run(): Promise<void> {
    this.running = true;
    this.logger.info(`Polling for updates (timeout ${this.timeoutSeconds}s)`);

    while (this.running) {
      try {
        await this.pollOnce();
        this.failures = 0;
      } catch (error) {
        this.failures++;
        const backoff = this.backoffMs(this.failures);
        this.logger.error(
          { err: error },
          `Polling failed, retrying in ${backoff / 1000}s (attempt ${this.failures})`,
        );
        await this.sleep(backoff);
      }
    }
    this.logger.info("Polling stopped");
  }

  stop() {
    this.running = false;
  }
}
