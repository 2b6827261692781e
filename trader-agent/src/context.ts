/**
 * Process-wide context: session identity, logger, the cooperative running
 * flag and teardown hooks. Built once at startup and passed by reference.
 */

import type { Logger } from "./logger.js";
import { errorMessage } from "../../src/lib/errors";

type Closer = () => void | Promise<void>;

/** Session id from the start time, e.g. trader-20260218-1930. */
export function sessionIdFor(date: Date = new Date(), prefix: string = "trader"): string {
  const d = date.toISOString().slice(0, 10).replace(/-/g, "");
  const t = date.toISOString().slice(11, 16).replace(":", "");
  return `${prefix}-${d}-${t}`;
}

export class TraderContext {
  readonly sessionId: string;
  readonly logger: Logger;
  private _running = true;
  private shutdownReason: string | null = null;
  private readonly closers: Closer[] = [];
  private wakers = new Set<() => void>();

  constructor(opts: { sessionId: string; logger: Logger }) {
    this.sessionId = opts.sessionId;
    this.logger = opts.logger;
  }

  get running(): boolean {
    return this._running;
  }

  get stopReason(): string | null {
    return this.shutdownReason;
  }

  /** Ask the loop to stop after the in-flight tick. Idempotent. */
  requestShutdown(reason: string): void {
    if (!this._running) return;
    this._running = false;
    this.shutdownReason = reason;
    this.logger.info(`[SHUTDOWN] ${reason}, finishing current tick`);
    for (const wake of this.wakers) wake();
    this.wakers.clear();
  }

  /** Sleep that returns early once shutdown is requested. */
  sleep(ms: number): Promise<void> {
    if (!this._running || ms <= 0) return Promise.resolve();
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wakers.delete(done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wakers.add(done);
    });
  }

  onTeardown(fn: Closer): void {
    this.closers.push(fn);
  }

  /** Run teardown hooks newest first; a failing hook is logged and the rest still run. */
  async teardown(): Promise<void> {
    while (this.closers.length > 0) {
      const fn = this.closers.pop();
      if (!fn) break;
      try {
        await fn();
      } catch (err) {
        this.logger.error(`[SHUTDOWN] teardown step failed: ${errorMessage(err)}`);
      }
    }
  }

  /** Route SIGINT/SIGTERM to requestShutdown. Returns a function that removes the handlers. */
  installSignalHandlers(): () => void {
    const onInt = () => this.requestShutdown("SIGINT received");
    const onTerm = () => this.requestShutdown("SIGTERM received");
    process.on("SIGINT", onInt);
    process.on("SIGTERM", onTerm);
    return () => {
      process.off("SIGINT", onInt);
      process.off("SIGTERM", onTerm);
    };
  }
}
