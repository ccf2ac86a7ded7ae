import type { AlertChannel, MarketDataSource, MarketInfo, MarketResolver, OrderExecutionClient } from "../clients/types.js";
import type { MakerConfig, MarketConfig } from "../config/makerConfig.js";
import { describeError } from "../lib/errors.js";
import type { MakerError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { msUntilNextHour, sleep } from "../lib/timing.js";
import type { TradeLog } from "../lib/tradeLog.js";
import { MarketWorker } from "./MarketWorker.js";
import { OrderLifecycleMonitor } from "./OrderLifecycleMonitor.js";
import type { MonitorSnapshot } from "./OrderLifecycleMonitor.js";
import { escapeHtml, formatPrice, OutcomeDispatcher } from "./OutcomeDispatcher.js";
import type { Strategy } from "./types.js";

export interface SafeDepthDeps {
    config: MakerConfig;
    resolver: MarketResolver;
    marketData: MarketDataSource;
    execution: OrderExecutionClient;
    alerts: AlertChannel;
    tradeLog: TradeLog;
    logger: Logger;
    statusReport: boolean;
    now?: () => number;
}

interface MarketSlot {
    market: MarketInfo;
    config: MarketConfig;
    monitor: OrderLifecycleMonitor;
    worker: MarketWorker;
}

export function startOfDay(now: Date): Date {
    const day = new Date(now);
    day.setHours(0, 0, 0, 0);
    return day;
}

export function buildStatusReport(snapshots: readonly MonitorSnapshot[], balance: number | null, fillsToday: number, now: number): string {
    const orders = snapshots.flatMap(s => (s.order ? [s.order] : []));
    const restingUsd = orders.reduce((sum, o) => sum + o.sizeUsd, 0);
    const lines = [
        `📊 <b>Status report</b>`,
        `💰 Balance: <code>${balance === null ? "n/a" : `$${balance.toFixed(2)}`}</code>`,
        `📋 Orders: <code>${orders.length}</code> ($${restingUsd.toFixed(0)} resting)`,
        `✅ Fills today: <code>${fillsToday}</code>`,
        ""
    ];
    for (const s of snapshots) {
        const title = escapeHtml(s.market.title.slice(0, 40));
        if (!s.order) {
            lines.push(`📌 ${title}: ${s.state.toLowerCase()}, no order`);
            continue;
        }
        const rank = s.lastSeen ? s.lastSeen.rank : s.order.rank;
        const ahead = s.lastSeen ? `, $${s.lastSeen.protectionAhead.toFixed(0)} ahead` : "";
        const age = Math.max(0, Math.round((now - s.order.createdAt) / 60_000));
        lines.push(`📌 ${title}: <code>${formatPrice(s.order.price, s.market.tickSize)}</code> (bid${rank}${ahead}, ${age}m)`);
    }
    return lines.join("\n");
}

/**
 * Keeps one protected bid per configured market. Each market runs its own
 * worker; a market that fails to resolve is skipped, the others keep running.
 */
export class SafeDepthStrategy implements Strategy {
    readonly name = "safe-depth";

    private readonly deps: SafeDepthDeps;
    private readonly logger: Logger;
    private readonly dispatcher: OutcomeDispatcher;
    private readonly now: () => number;
    private readonly reportAbort = new AbortController();
    private slots: MarketSlot[] = [];
    private reportLoop: Promise<void> | null = null;
    private fatalError: MakerError | null = null;

    constructor(deps: SafeDepthDeps) {
        this.deps = deps;
        this.logger = deps.logger.child({ strategy: this.name });
        this.now = deps.now ?? Date.now;
        this.dispatcher = new OutcomeDispatcher({
            logger: this.logger,
            alerts: deps.alerts,
            tradeLog: deps.tradeLog,
            alertAfterFailures: deps.config.alertAfterFailures,
            now: this.now
        });
    }

    get markets(): readonly MarketInfo[] {
        return this.slots.map(s => s.market);
    }

    async init(): Promise<void> {
        for (const config of this.deps.config.markets) {
            let market: MarketInfo;
            try {
                market = await this.deps.resolver.resolveMarket(config.id);
            } catch (err) {
                this.logger.error({ market: config.id, err: describeError(err) }, "Could not resolve market, skipping it");
                this.dispatcher.notify("WARNING", `⚠️ <b>Market skipped</b>\n📌 ${escapeHtml(config.id)}\n${escapeHtml(describeError(err))}`);
                continue;
            }
            this.slots.push(this.createSlot(market, config));
        }

        if (this.slots.length === 0) throw new Error("None of the configured markets could be resolved");

        for (const { market, config } of this.slots) {
            this.logger.info(
                {
                    market: market.marketId,
                    tickSize: market.tickSize,
                    minProtection: config.minProtectionAmount,
                    maxRank: config.firstOrderMaxRank,
                    sizeUsd: config.orderSizeUsd
                },
                `Managing "${market.title}"`
            );
        }
        this.dispatcher.notify(
            "INFO",
            [`🚀 <b>Safe-depth maker started</b>`, ...this.slots.map(s => `📌 ${escapeHtml(s.market.title.slice(0, 40))} ($${s.config.minProtectionAmount} / bid${s.config.firstOrderMaxRank})`)].join("\n")
        );
    }

    /** Other markets keep running after a fatal worker error; it is rethrown once all have ended. */
    async run(): Promise<void> {
        if (this.deps.statusReport && this.deps.config.statusReport && !this.reportLoop) {
            this.reportLoop = this.runStatusReports();
        }
        await Promise.all(this.slots.map(slot => this.runWorker(slot)));
        if (this.fatalError) throw this.fatalError;
        this.logger.info("All market workers have ended");
    }

    async cleanup(): Promise<void> {
        this.reportAbort.abort();
        await Promise.all(this.slots.map(slot => slot.worker.stop()));
        if (this.reportLoop) await this.reportLoop;
        this.dispatcher.notify("INFO", "🛑 <b>Safe-depth maker stopped</b>");
        await this.dispatcher.flush();
    }

    async sendStatusReport(): Promise<void> {
        let balance: number | null = null;
        try {
            balance = await this.deps.execution.getCollateralBalance();
        } catch (err) {
            this.logger.warn({ err: describeError(err) }, "Balance lookup failed");
        }

        let fillsToday = 0;
        try {
            fillsToday = await this.deps.tradeLog.countSince(startOfDay(new Date(this.now())));
        } catch (err) {
            this.logger.warn({ err: describeError(err) }, "Trade log read failed");
        }

        const snapshots = this.slots.map(s => s.monitor.snapshot());
        this.logger.info(
            { balance, fillsToday, resting: snapshots.filter(s => s.order !== null).length },
            "Status report"
        );
        this.dispatcher.notify("INFO", buildStatusReport(snapshots, balance, fillsToday, this.now()));
    }

    private async runWorker(slot: MarketSlot): Promise<void> {
        await slot.worker.start();
        const error = slot.worker.fatalError;
        if (!error) return;
        this.logger.fatal({ market: slot.market.marketId, code: error.code }, `Market worker ended: ${error.message}`);
        if (!this.fatalError) this.fatalError = error;
    }

    private createSlot(market: MarketInfo, config: MarketConfig): MarketSlot {
        const monitor = new OrderLifecycleMonitor(market, config, {
            marketData: this.deps.marketData,
            execution: this.deps.execution,
            now: this.now
        });
        const worker = new MarketWorker(
            market,
            monitor,
            this.dispatcher,
            {
                pollIntervalMs: config.pollIntervalMs,
                maxBackoffMs: this.deps.config.maxBackoffMs,
                resumeAfterFill: config.resumeAfterFill
            },
            this.logger.child({ market: market.marketId })
        );
        return { market, config, monitor, worker };
    }

    /** One report at startup, then one at the top of every hour. */
    private async runStatusReports(): Promise<void> {
        const signal = this.reportAbort.signal;
        while (!signal.aborted) {
            await this.sendStatusReport();
            const waited = await sleep(msUntilNextHour(new Date(this.now())), signal);
            if (!waited) break;
        }
    }
}
