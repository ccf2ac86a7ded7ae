import type { AlertChannel, AlertSeverity, MarketInfo } from "../clients/types.js";
import { describeError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { tickDecimals } from "../lib/orderbook.js";
import type { TradeLog } from "../lib/tradeLog.js";
import type { FillEvent, ManagedOrder, TickOutcome } from "./OrderLifecycleMonitor.js";

export interface DispatcherDeps {
    logger: Logger;
    alerts: AlertChannel;
    tradeLog: TradeLog;
    alertAfterFailures: number;
    now?: () => number;
}

interface MarketAlertState {
    failures: number;
    notFoundKey: string | null;
}

const TRIGGER_LABELS = {
    INITIAL: "initial placement",
    INSUFFICIENT_PROTECTION: "insufficient protection",
    RANK_EXCEEDED: "rank exceeded"
} as const;

export function escapeHtml(text: string): string {
    return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatPrice(price: number, tickSize: number): string {
    return price.toFixed(Math.max(tickDecimals(tickSize), 2));
}

/**
 * The only place tick outcomes turn into log lines, alerts and trade-log records.
 * Alerts are fire-and-forget; `flush()` waits for the ones still in flight.
 */
export class OutcomeDispatcher {
    private readonly logger: Logger;
    private readonly alerts: AlertChannel;
    private readonly tradeLog: TradeLog;
    private readonly alertAfterFailures: number;
    private readonly now: () => number;
    private readonly perMarket = new Map<string, MarketAlertState>();
    private readonly inflight = new Set<Promise<void>>();

    constructor(deps: DispatcherDeps) {
        this.logger = deps.logger;
        this.alerts = deps.alerts;
        this.tradeLog = deps.tradeLog;
        this.alertAfterFailures = deps.alertAfterFailures;
        this.now = deps.now ?? Date.now;
    }

    async handle(market: MarketInfo, outcome: TickOutcome): Promise<void> {
        const log = this.logger.child({ market: market.marketId });
        const state = this.stateFor(market.marketId);
        const title = escapeHtml(market.title.slice(0, 40));
        const px = (price: number) => formatPrice(price, market.tickSize);

        if (outcome.kind !== "TRANSIENT_ERROR") state.failures = 0;
        if (outcome.kind !== "NOT_FOUND_IN_RANGE") state.notFoundKey = null;

        switch (outcome.kind) {
            case "NO_ACTION":
                if (outcome.order && outcome.current) {
                    log.debug(
                        { price: outcome.order.price, rank: outcome.current.rank, protection: Math.round(outcome.current.protectionAhead) },
                        `Holding @ ${px(outcome.order.price)} (bid${outcome.current.rank}, $${outcome.current.protectionAhead.toFixed(0)} ahead)`
                    );
                }
                return;

            case "PLACED":
                for (const line of outcome.depth) log.info(line);
                log.info(
                    { orderId: outcome.order.orderId, price: outcome.order.price, rank: outcome.order.rank },
                    `Order placed @ ${px(outcome.order.price)} (bid${outcome.order.rank}, $${outcome.protection.toFixed(0)} ahead)`
                );
                this.notify(
                    "INFO",
                    [
                        `✅ <b>Order placed</b>`,
                        `📌 Market: ${title}`,
                        `💰 Price: <code>${px(outcome.order.price)}</code> (bid${outcome.order.rank})`,
                        `🛡️ Protection: <code>$${outcome.protection.toFixed(0)}</code>`,
                        `💵 Size: <code>$${outcome.order.sizeUsd}</code>`
                    ].join("\n")
                );
                return;

            case "REPLACED":
                for (const line of outcome.depth) log.info(line);
                log.info(
                    {
                        trigger: outcome.trigger,
                        oldOrderId: outcome.oldOrder.orderId,
                        orderId: outcome.order.orderId,
                        from: outcome.oldOrder.price,
                        to: outcome.order.price
                    },
                    `Adjusted (${TRIGGER_LABELS[outcome.trigger]}): ${px(outcome.oldOrder.price)} (bid${outcome.before.rank}) -> ${px(outcome.order.price)} (bid${outcome.order.rank})`
                );
                this.notify(
                    "INFO",
                    [
                        `🔄 <b>Order adjusted</b> (${TRIGGER_LABELS[outcome.trigger]})`,
                        `📌 Market: ${title}`,
                        `📉 From: <code>${px(outcome.oldOrder.price)}</code> (bid${outcome.before.rank}, $${outcome.before.protectionAhead.toFixed(0)} ahead)`,
                        `📈 To: <code>${px(outcome.order.price)}</code> (bid${outcome.order.rank}, $${outcome.protection.toFixed(0)} ahead)`
                    ].join("\n")
                );
                return;

            case "NOT_FOUND_IN_RANGE": {
                const key = `${outcome.trigger}:${outcome.scope}`;
                const scope = outcome.scope === "BOUNDED" ? "within the rank limit" : "anywhere in the book";
                log.warn(
                    { trigger: outcome.trigger, scope: outcome.scope, orderId: outcome.order?.orderId },
                    `No level satisfies the protection ${scope} (${TRIGGER_LABELS[outcome.trigger]})`
                );
                if (state.notFoundKey === key) return;
                state.notFoundKey = key;
                const action = outcome.order
                    ? `Existing order kept @ <code>${px(outcome.order.price)}</code>`
                    : "No order placed; retrying every tick";
                this.notify(
                    "WARNING",
                    [
                        `⚠️ <b>No safe price found</b> ${scope}`,
                        `📌 Market: ${title}`,
                        `🔍 Reason: ${TRIGGER_LABELS[outcome.trigger]}`,
                        action
                    ].join("\n")
                );
                return;
            }

            case "FILL_DETECTED":
                await this.recordFill(market, outcome.fill, log);
                return;

            case "ORDER_LOST":
                log.warn({ orderId: outcome.order.orderId, rawStatus: outcome.rawStatus }, "Order no longer live with nothing filled, re-placing");
                this.notify(
                    "WARNING",
                    [
                        `⚠️ <b>Order canceled outside the bot</b>`,
                        `📌 Market: ${title}`,
                        `⚙️ Status: <code>${escapeHtml(outcome.rawStatus)}</code>`,
                        `A new order will be placed on the next tick.`
                    ].join("\n")
                );
                return;

            case "REPLACE_FAILED":
                log.error({ oldOrderId: outcome.oldOrder.orderId, err: outcome.error.message }, "Replacement order failed after cancel");
                this.notify(
                    "WARNING",
                    [
                        `⚠️ <b>Replacement failed</b>`,
                        `📌 Market: ${title}`,
                        `❌ ${escapeHtml(outcome.error.message)}`,
                        `No order is resting; the next tick places a new one.`
                    ].join("\n")
                );
                return;

            case "TRANSIENT_ERROR":
                state.failures++;
                log.warn({ code: outcome.error.code, failures: state.failures }, `Tick failed: ${outcome.error.message}`);
                if (state.failures === this.alertAfterFailures) {
                    this.notify(
                        "WARNING",
                        [
                            `⚠️ <b>${state.failures} consecutive failures</b>`,
                            `📌 Market: ${title}`,
                            `❌ ${escapeHtml(outcome.error.message)}`
                        ].join("\n")
                    );
                }
                return;

            case "FATAL":
                log.error({ code: outcome.error.code }, `Worker stopped: ${outcome.error.message}`);
                this.notify(
                    "CRITICAL",
                    [`❌ <b>Market worker stopped</b>`, `📌 Market: ${title}`, `<code>${escapeHtml(outcome.error.message)}</code>`].join("\n")
                );
                return;

            case "CLOSED":
                return;
        }
    }

    /** Sends an alert without blocking the caller; failures are logged. */
    notify(severity: AlertSeverity, message: string): void {
        const pending = this.alerts
            .notify(severity, message)
            .catch(err => this.logger.warn({ err: describeError(err) }, "Alert delivery failed"))
            .finally(() => this.inflight.delete(pending));
        this.inflight.add(pending);
    }

    async flush(): Promise<void> {
        await Promise.all([...this.inflight]);
    }

    private async recordFill(market: MarketInfo, fill: FillEvent, log: Logger): Promise<void> {
        const order: ManagedOrder = fill.order;
        const { verdict } = fill;
        const label = verdict.kind === "FULL_FILL" ? "Full fill" : "Partial fill";
        const px = formatPrice(order.price, market.tickSize);
        const filledUsd = verdict.amountFilled * order.price;
        const heldFor = Math.round((this.now() - order.createdAt) / 1000);

        log.warn(
            {
                orderId: order.orderId,
                verdict: verdict.kind,
                filled: verdict.amountFilled,
                ordered: fill.orderedAmount,
                rawStatus: fill.rawStatus,
                detectedDuring: fill.detectedDuring
            },
            `${label} @ ${px}: ${verdict.amountFilled}/${fill.orderedAmount} (status ${fill.rawStatus}, held ${heldFor}s)`
        );

        try {
            await this.tradeLog.append({
                timestamp: new Date(this.now()).toISOString(),
                marketId: market.marketId,
                title: market.title,
                orderId: order.orderId,
                price: order.price,
                filledAmount: verdict.amountFilled,
                filledUsd: Number(filledUsd.toFixed(2)),
                verdict: verdict.kind,
                rawStatus: fill.rawStatus
            });
        } catch (err) {
            log.error({ err: describeError(err) }, "Failed to append fill to the trade log");
        }

        const lines = [
            `⚠️ <b>${label}</b>`,
            `📌 Market: ${escapeHtml(market.title.slice(0, 40))}`,
            `📊 Side: BUY YES`,
            `💰 Price: <code>${px}</code>`,
            `💵 Filled: <code>${verdict.amountFilled} / ${fill.orderedAmount}</code> (≈ $${filledUsd.toFixed(2)})`,
            `⚙️ Final status: <code>${escapeHtml(fill.rawStatus)}</code>`,
            `⏰ Resting for: <code>${heldFor}s</code>`
        ];
        if (fill.residualCanceled === false) {
            lines.push(`❌ Residual could not be canceled: ${escapeHtml(fill.residualError ?? "unknown error")}`);
        }
        lines.push("Check your position!");
        this.notify(fill.residualCanceled === false ? "CRITICAL" : "WARNING", lines.join("\n"));
    }

    private stateFor(marketId: string): MarketAlertState {
        let state = this.perMarket.get(marketId);
        if (!state) {
            state = { failures: 0, notFoundKey: null };
            this.perMarket.set(marketId, state);
        }
        return state;
    }
}
