import { describeError, isEscrowError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { StatusSnapshot } from "../payments/lifecycle.js";

/** Anything that can report the current escrow status of what it tracks. */
export interface StatusSource {
  pollStatus(): Promise<StatusSnapshot[]>;
}

export type StatusCallback = (snapshots: StatusSnapshot[]) => void | Promise<void>;

export interface MonitorHandle {
  readonly target: StatusSource;
  readonly intervalMs: number;
  readonly active: boolean;
  /** Number of polls that returned a result. */
  readonly polls: number;
  /** Snapshots from the most recent successful poll. */
  readonly latest: StatusSnapshot[] | undefined;
  /** Settles once the loop has exited. Never rejects. */
  readonly done: Promise<void>;
  stop(): void;
}

export interface StatusMonitorOptions {
  logger?: Logger;
}

// One loop per target, whichever StatusMonitor started it.
const activeHandles = new WeakMap<StatusSource, PollingHandle>();

export class StatusMonitor {
  private readonly logger: Logger;
  private readonly handles = new Set<PollingHandle>();

  constructor(options: StatusMonitorOptions = {}) {
    this.logger = options.logger ?? silentLogger();
  }

  /**
   * Polls `target` every `intervalMs`, handing each result to `callback`. The
   * next poll is only scheduled once the previous poll and its callback have
   * finished. A loop already running for `target` is stopped first.
   */
  start(target: StatusSource, intervalMs: number, callback: StatusCallback): MonitorHandle {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`intervalMs must be a positive number, got ${intervalMs}`);
    }

    activeHandles.get(target)?.stop();

    const handle = new PollingHandle(target, intervalMs, callback, this.logger, (stopped) => {
      this.handles.delete(stopped);
      if (activeHandles.get(target) === stopped) {
        activeHandles.delete(target);
      }
    });
    activeHandles.set(target, handle);
    this.handles.add(handle);

    this.logger.info({ intervalMs }, "Status monitoring started");
    return handle;
  }

  stop(target: StatusSource): void {
    activeHandles.get(target)?.stop();
  }

  handleFor(target: StatusSource): MonitorHandle | undefined {
    return activeHandles.get(target);
  }

  /** Stops every loop this monitor started and waits for them to exit. */
  async stopAll(): Promise<void> {
    const handles = [...this.handles];
    for (const handle of handles) {
      handle.stop();
    }
    await Promise.all(handles.map(async (handle) => handle.done));
  }
}

class PollingHandle implements MonitorHandle {
  readonly done: Promise<void>;
  private stopRequested = false;
  private pollCount = 0;
  private latestSnapshots: StatusSnapshot[] | undefined;
  private wake: (() => void) | undefined;

  constructor(
    readonly target: StatusSource,
    readonly intervalMs: number,
    private readonly callback: StatusCallback,
    private readonly logger: Logger,
    private readonly onStopped: (handle: PollingHandle) => void
  ) {
    this.done = this.run();
  }

  get active(): boolean {
    return !this.stopRequested;
  }

  get polls(): number {
    return this.pollCount;
  }

  get latest(): StatusSnapshot[] | undefined {
    return this.latestSnapshots;
  }

  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.wake?.();
    this.onStopped(this);
    this.logger.info({ polls: this.pollCount }, "Status monitoring stopped");
  }

  private async run(): Promise<void> {
    // Let start() return the handle before the first poll goes out.
    await Promise.resolve();

    while (!this.stopRequested) {
      const snapshots = await this.poll();
      if (this.stopRequested) break;

      if (snapshots) {
        this.pollCount += 1;
        this.latestSnapshots = snapshots;
        await this.deliver(snapshots);
      }
      if (this.stopRequested) break;

      await this.sleep(this.intervalMs);
    }
  }

  private async poll(): Promise<StatusSnapshot[] | undefined> {
    try {
      return await this.target.pollStatus();
    } catch (error) {
      this.logger.error(
        {
          kind: isEscrowError(error) ? error.kind : "unknown",
          error: describeError(error)
        },
        "Status poll failed"
      );
      return undefined;
    }
  }

  private async deliver(snapshots: StatusSnapshot[]): Promise<void> {
    try {
      await this.callback(snapshots);
    } catch (error) {
      this.logger.error({ error: describeError(error) }, "Status callback failed");
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }
}
