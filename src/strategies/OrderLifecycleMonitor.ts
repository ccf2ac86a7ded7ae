import type { MarketDataSource, MarketInfo, OrderExecutionClient, OrderStatusReport, Outcome, OrderSide } from "../clients/types.js";
import { describeError, toMakerError, ReplaceRaceError } from "../lib/errors.js";
import type { MakerError } from "../lib/errors.js";
import { classifyFill, isFill, normalizeOrderStatus } from "../lib/fillClassifier.js";
import type { FillVerdict, OrderStatus } from "../lib/fillClassifier.js";
import { describeDepth } from "../lib/orderbook.js";
import type { OrderBook } from "../lib/orderbook.js";
import { decidePlacement } from "../lib/placement.js";
import type { AdjustTrigger, PlacementDecision, ProtectionConfig, SearchScope } from "../lib/placement.js";
import type { RankProtection } from "../lib/rankProtection.js";
import { withTimeout } from "../lib/timing.js";

export type MonitorState = "UNPLACED" | "RESTING" | "PENDING_REPLACE" | "CLOSED";

export interface ManagedOrder {
    orderId: string;
    marketId: string;
    side: OrderSide;
    outcome: Outcome;
    price: number;
    rank: number;       // rank at placement time
    createdAt: number;
    sizeUsd: number;
}

export interface MonitorConfig extends ProtectionConfig {
    readonly requestTimeoutMs: number;
    readonly fillEpsilon: number;
}

export interface FillEvent {
    order: ManagedOrder;
    verdict: Exclude<FillVerdict, { kind: "NO_FILL" }>;
    rawStatus: string;
    orderedAmount: number;
    detectedDuring: "POLL" | "REPLACE" | "SHUTDOWN";
    residualCanceled: boolean | null; // null when nothing was left live
    residualError?: string;
}

interface OrderRead {
    status: OrderStatusReport;
    normalized: OrderStatus;
    fill: FillEvent | null;
}

export type TickOutcome =
    | { kind: "NO_ACTION"; order: ManagedOrder | null; current: RankProtection | null }
    | { kind: "PLACED"; order: ManagedOrder; protection: number; depth: string[] }
    | {
          kind: "REPLACED";
          oldOrder: ManagedOrder;
          order: ManagedOrder;
          trigger: Exclude<AdjustTrigger, "INITIAL">;
          before: RankProtection;
          protection: number;
          depth: string[];
      }
    | {
          kind: "NOT_FOUND_IN_RANGE";
          trigger: AdjustTrigger;
          scope: SearchScope;
          order: ManagedOrder | null;
          current: RankProtection | null;
      }
    | { kind: "FILL_DETECTED"; fill: FillEvent }
    | { kind: "ORDER_LOST"; order: ManagedOrder; rawStatus: string }
    | { kind: "REPLACE_FAILED"; oldOrder: ManagedOrder; error: ReplaceRaceError }
    | { kind: "TRANSIENT_ERROR"; error: MakerError }
    | { kind: "FATAL"; error: MakerError }
    | { kind: "CLOSED" };

export interface ShutdownReport {
    canceled: ManagedOrder | null;
    fills: FillEvent[];
    errors: MakerError[];
}

export interface MonitorSnapshot {
    market: MarketInfo;
    state: MonitorState;
    order: ManagedOrder | null;
    lastSeen: RankProtection | null;
    lastTickAt: number | null;
}

export interface MonitorDeps {
    marketData: MarketDataSource;
    execution: OrderExecutionClient;
    now?: () => number;
}

/**
 * Owns the single resting bid of one market.
 *
 * Each tick: confirm the live order has not traded, fetch the book, decide, apply.
 * tick() never throws: every failure comes back as a TickOutcome.
 */
export class OrderLifecycleMonitor {
    private state: MonitorState = "UNPLACED";
    private order: ManagedOrder | null = null;
    // canceled order whose final fill state has not been read yet
    private pendingVerification: ManagedOrder | null = null;
    private lastSeen: RankProtection | null = null;
    private lastTickAt: number | null = null;
    private closedBy: "FILL" | "FATAL" | "STOP" | null = null;

    private readonly market: MarketInfo;
    private readonly config: MonitorConfig;
    private readonly marketData: MarketDataSource;
    private readonly execution: OrderExecutionClient;
    private readonly now: () => number;

    constructor(market: MarketInfo, config: MonitorConfig, deps: MonitorDeps) {
        this.market = market;
        this.config = config;
        this.marketData = deps.marketData;
        this.execution = deps.execution;
        this.now = deps.now ?? Date.now;
    }

    get currentState(): MonitorState {
        return this.state;
    }

    get currentOrder(): ManagedOrder | null {
        return this.order;
    }

    snapshot(): MonitorSnapshot {
        return {
            market: this.market,
            state: this.state,
            order: this.order,
            lastSeen: this.lastSeen,
            lastTickAt: this.lastTickAt
        };
    }

    async tick(): Promise<TickOutcome> {
        if (this.state === "CLOSED") return { kind: "CLOSED" };
        this.lastTickAt = this.now();

        try {
            return await this.step();
        } catch (err) {
            const error = toMakerError(err, { marketId: this.market.marketId });
            if (this.state === "PENDING_REPLACE") this.state = "RESTING";
            if (error.fatal) {
                this.close("FATAL");
                return { kind: "FATAL", error };
            }
            return { kind: "TRANSIENT_ERROR", error };
        }
    }

    /** Starts a fresh placement cycle after a fill. A fatal close stays closed. */
    resume(): boolean {
        if (this.state !== "CLOSED" || this.closedBy !== "FILL") return false;
        this.state = "UNPLACED";
        this.closedBy = null;
        this.lastSeen = null;
        return true;
    }

    /**
     * Cancels the resting order and closes the monitor. The canceled order and
     * any order still awaiting verification are read back one last time, so a
     * fill that landed after the last tick is still reported.
     */
    async shutdown(): Promise<ShutdownReport> {
        const order = this.order;
        const unverified = this.pendingVerification;
        this.order = null;
        this.pendingVerification = null;
        this.close("STOP");

        const report: ShutdownReport = { canceled: null, fills: [], errors: [] };
        if (order) {
            try {
                await this.call("cancelOrder", this.execution.cancelOrder(order.orderId));
                report.canceled = order;
            } catch (err) {
                report.errors.push(toMakerError(err, { marketId: this.market.marketId }));
            }
        }

        for (const pending of [unverified, order]) {
            if (!pending) continue;
            try {
                const read = await this.readOrder(pending, "SHUTDOWN");
                if (!read.fill) continue;
                if (pending === order && read.fill.verdict.kind === "PARTIAL_FILL" && read.normalized !== "FILLED") {
                    read.fill.residualCanceled = report.canceled !== null;
                    if (!report.canceled) read.fill.residualError = report.errors[0]?.message;
                }
                report.fills.push(read.fill);
            } catch (err) {
                report.errors.push(toMakerError(err, { marketId: this.market.marketId }));
            }
        }
        return report;
    }

    private async step(): Promise<TickOutcome> {
        if (this.pendingVerification) {
            const read = await this.readOrder(this.pendingVerification, "REPLACE");
            this.pendingVerification = null;
            if (read.fill) return this.closeOnFill(read.fill, read.normalized);
        }

        if (this.order) {
            const live = this.order;
            const read = await this.readOrder(live, "POLL");
            if (read.fill) return this.closeOnFill(read.fill, read.normalized);
            if (read.normalized === "CANCELED") {
                // expired or canceled outside the bot with nothing traded
                this.order = null;
                this.state = "UNPLACED";
                this.lastSeen = null;
                return { kind: "ORDER_LOST", order: live, rawStatus: String(read.status.rawStatus ?? "") };
            }
        }

        const book = await this.call("fetchOrderBook", this.marketData.fetchOrderBook(this.market.marketId, "BID"));
        const decision = decidePlacement(book, this.config, this.order);
        return this.apply(decision, book);
    }

    private async readOrder(order: ManagedOrder, detectedDuring: FillEvent["detectedDuring"]): Promise<OrderRead> {
        const status = await this.call("getOrderStatus", this.execution.getOrderStatus(order.orderId));
        const normalized = normalizeOrderStatus(status.rawStatus);
        const verdict = classifyFill(status.rawStatus, status.filledAmount, status.orderedAmount, this.config.fillEpsilon);
        if (!isFill(verdict)) return { status, normalized, fill: null };
        return {
            status,
            normalized,
            fill: {
                order,
                verdict,
                rawStatus: String(status.rawStatus ?? ""),
                orderedAmount: status.orderedAmount,
                detectedDuring,
                residualCanceled: null
            }
        };
    }

    private async closeOnFill(event: FillEvent, status: OrderStatus): Promise<TickOutcome> {
        // a partially filled order that is still live would rest unmanaged once we stop tracking it
        if (event.verdict.kind === "PARTIAL_FILL" && status === "OPEN") {
            try {
                await this.call("cancelOrder", this.execution.cancelOrder(event.order.orderId));
                event.residualCanceled = true;
            } catch (err) {
                event.residualCanceled = false;
                event.residualError = describeError(err);
            }
        }
        if (this.order?.orderId === event.order.orderId) this.order = null;
        this.close("FILL");
        return { kind: "FILL_DETECTED", fill: event };
    }

    private async apply(decision: PlacementDecision, book: OrderBook): Promise<TickOutcome> {
        switch (decision.kind) {
            case "NO_ACTION":
                this.lastSeen = decision.current;
                return { kind: "NO_ACTION", order: this.order, current: decision.current };

            case "NOT_FOUND_IN_RANGE":
                this.lastSeen = decision.current;
                return {
                    kind: "NOT_FOUND_IN_RANGE",
                    trigger: decision.trigger,
                    scope: decision.scope,
                    order: this.order,
                    current: decision.current
                };

            case "PLACE": {
                const order = await this.place(decision.price, decision.rank);
                return { kind: "PLACED", order, protection: decision.protection, depth: describeDepth(book) };
            }

            case "REPLACE": {
                const oldOrder = this.order;
                if (!oldOrder) throw new Error("REPLACE decided without a resting order");

                this.state = "PENDING_REPLACE";
                await this.call("cancelOrder", this.execution.cancelOrder(oldOrder.orderId));
                this.order = null;
                this.lastSeen = null;
                this.state = "UNPLACED";

                // the order may have traded between our last poll and the cancel
                this.pendingVerification = oldOrder;
                const read = await this.readOrder(oldOrder, "REPLACE");
                this.pendingVerification = null;
                if (read.fill) return this.closeOnFill(read.fill, read.normalized);

                let order: ManagedOrder;
                try {
                    order = await this.place(decision.newPrice, decision.newRank);
                } catch (err) {
                    const error = toMakerError(err, { marketId: this.market.marketId });
                    if (error.fatal) throw error;
                    return { kind: "REPLACE_FAILED", oldOrder, error: new ReplaceRaceError(oldOrder.orderId, error) };
                }
                return {
                    kind: "REPLACED",
                    oldOrder,
                    order,
                    trigger: decision.trigger,
                    before: decision.current,
                    protection: decision.protection,
                    depth: describeDepth(book)
                };
            }
        }
    }

    private async place(price: number, rank: number): Promise<ManagedOrder> {
        const orderId = await this.call(
            "placeOrder",
            this.execution.placeOrder({
                marketId: this.market.marketId,
                outcome: "YES",
                side: "BUY",
                price,
                sizeUsd: this.config.orderSizeUsd
            })
        );
        const order: ManagedOrder = {
            orderId,
            marketId: this.market.marketId,
            side: "BUY",
            outcome: "YES",
            price,
            rank,
            createdAt: this.now(),
            sizeUsd: this.config.orderSizeUsd
        };
        this.order = order;
        this.state = "RESTING";
        return order;
    }

    private close(reason: "FILL" | "FATAL" | "STOP"): void {
        this.state = "CLOSED";
        this.closedBy = reason;
    }

    private call<T>(label: string, work: Promise<T>): Promise<T> {
        return withTimeout(work, this.config.requestTimeoutMs, `${label} [${this.market.marketId}]`);
    }
}
