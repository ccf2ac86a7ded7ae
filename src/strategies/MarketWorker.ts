import { RateLimitedError } from "../lib/errors.js";
import type { MakerError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { backoffDelay, sleep } from "../lib/timing.js";
import type { OrderLifecycleMonitor, TickOutcome } from "./OrderLifecycleMonitor.js";
import { escapeHtml } from "./OutcomeDispatcher.js";
import type { OutcomeDispatcher } from "./OutcomeDispatcher.js";
import type { MarketInfo } from "../clients/types.js";

export interface WorkerConfig {
    pollIntervalMs: number;
    maxBackoffMs: number;
    resumeAfterFill: boolean;
}

/**
 * Scheduling loop of one market. Ticks run strictly one after another; the
 * next tick is only scheduled once the previous one (cancel and place
 * included) has settled.
 */
export class MarketWorker {
    private market: MarketInfo;
    private monitor: OrderLifecycleMonitor;
    private dispatcher: OutcomeDispatcher;
    private config: WorkerConfig;
    private logger: Logger;

    private readonly abort = new AbortController();
    private loop: Promise<void> | null = null;
    private consecutiveFailures = 0;
    private fatal: MakerError | null = null;

    constructor(market: MarketInfo, monitor: OrderLifecycleMonitor, dispatcher: OutcomeDispatcher, config: WorkerConfig, logger: Logger) {
        this.market = market;
        this.monitor = monitor;
        this.dispatcher = dispatcher;
        this.config = config;
        this.logger = logger;
    }

    /** Starts the loop; the returned promise settles when the loop ends. */
    start(): Promise<void> {
        if (!this.loop) this.loop = this.run();
        return this.loop;
    }

    /** Stops scheduling, waits for the in-flight tick, then cancels the resting order. */
    async stop(): Promise<void> {
        this.abort.abort();
        if (this.loop) await this.loop;

        const report = await this.monitor.shutdown();
        if (report.canceled) {
            this.logger.info({ orderId: report.canceled.orderId, price: report.canceled.price }, "Canceled resting order on shutdown");
        }
        for (const fill of report.fills) {
            await this.dispatcher.handle(this.market, { kind: "FILL_DETECTED", fill });
        }
        for (const error of report.errors) {
            this.logger.error({ code: error.code, err: error.message }, "Shutdown cleanup failed");
            this.dispatcher.notify(
                "CRITICAL",
                `❌ <b>Shutdown cleanup failed</b>\n📌 Market: ${escapeHtml(this.market.title.slice(0, 40))}\n${escapeHtml(error.message)}\nCheck your open orders!`
            );
        }
    }

    /** The error that ended the loop, if it ended on one. */
    get fatalError(): MakerError | null {
        return this.fatal;
    }

    private async run(): Promise<void> {
        this.logger.info({ pollIntervalMs: this.config.pollIntervalMs }, "Worker started");

        while (!this.abort.signal.aborted) {
            const outcome = await this.monitor.tick();
            await this.dispatcher.handle(this.market, outcome);

            if (outcome.kind === "FATAL") {
                this.fatal = outcome.error;
                break;
            }
            if (outcome.kind === "FILL_DETECTED" || outcome.kind === "CLOSED") {
                if (!this.config.resumeAfterFill || !this.monitor.resume()) break;
                this.logger.info("Fill handled, starting a new placement cycle");
            }

            const waited = await sleep(this.nextDelay(outcome), this.abort.signal);
            if (!waited) break;
        }

        this.logger.info({ state: this.monitor.currentState }, "Worker stopped");
    }

    private nextDelay(outcome: TickOutcome): number {
        if (outcome.kind !== "TRANSIENT_ERROR") {
            this.consecutiveFailures = 0;
            return this.config.pollIntervalMs;
        }
        this.consecutiveFailures++;
        const backoff = backoffDelay(this.config.pollIntervalMs, this.consecutiveFailures, this.config.maxBackoffMs);
        const error = outcome.error;
        if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
            return Math.max(backoff, error.retryAfterMs);
        }
        return backoff;
    }
}
