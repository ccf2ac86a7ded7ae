import { beforeEach, describe, expect, it } from "vitest";

import { SimulatedExchange } from "../clients/simulated.js";
import type { MarketInfo } from "../clients/types.js";
import { AuthError, NetworkError, ReplaceRaceError } from "../lib/errors.js";
import type { OrderBook } from "../lib/orderbook.js";
import { OrderLifecycleMonitor } from "./OrderLifecycleMonitor.js";
import type { MonitorConfig, TickOutcome } from "./OrderLifecycleMonitor.js";

const config: MonitorConfig = {
    minProtectionAmount: 500,
    firstOrderMaxRank: 5,
    orderSizeUsd: 50,
    requestTimeoutMs: 1000,
    fillEpsilon: 0.01
};

function isKind<K extends TickOutcome["kind"]>(outcome: TickOutcome, kind: K): outcome is Extract<TickOutcome, { kind: K }> {
    return outcome.kind === kind;
}

function expectKind<K extends TickOutcome["kind"]>(outcome: TickOutcome, kind: K): Extract<TickOutcome, { kind: K }> {
    if (!isKind(outcome, kind)) throw new Error(`expected ${kind}, got ${outcome.kind}`);
    return outcome;
}

describe("OrderLifecycleMonitor", () => {
    let exchange: SimulatedExchange;
    let market: MarketInfo;
    let monitor: OrderLifecycleMonitor;

    beforeEach(() => {
        exchange = new SimulatedExchange();
        market = exchange.addMarket({
            marketId: "m1",
            title: "Will it rain in London tomorrow?",
            levels: [
                { price: 0.5, sizeUsd: 800 },
                { price: 0.49, sizeUsd: 400 },
                { price: 0.48, sizeUsd: 300 }
            ]
        });
        monitor = new OrderLifecycleMonitor(market, config, { marketData: exchange, execution: exchange, now: () => 1_000 });
    });

    async function placeFirstOrder(): Promise<string> {
        const placed = expectKind(await monitor.tick(), "PLACED");
        return placed.order.orderId;
    }

    it("places the first order one tick under a protected best bid", async () => {
        const placed = expectKind(await monitor.tick(), "PLACED");
        expect(placed.order.price).toBe(0.49);
        expect(placed.order.rank).toBe(1);
        expect(placed.protection).toBeCloseTo(800, 6);
        expect(placed.depth[0]).toBe("bid1: 0.50 (level $800 | cumulative $800)");
        expect(monitor.currentState).toBe("RESTING");
        expect(exchange.liveOrders("m1")).toHaveLength(1);
        expect(exchange.liveOrders("m1")[0].shares).toBe(102.04);
    });

    it("holds a protected order", async () => {
        await placeFirstOrder();
        const held = expectKind(await monitor.tick(), "NO_ACTION");
        expect(held.current?.rank).toBe(2);
        expect(held.current?.protectionAhead).toBeCloseTo(800, 6);
        expect(monitor.snapshot().lastSeen?.rank).toBe(2);
    });

    it("reports when no level within the rank bound is protected", async () => {
        exchange.setBook("m1", [{ price: 0.5, sizeUsd: 100 }]);
        const outcome = expectKind(await monitor.tick(), "NOT_FOUND_IN_RANGE");
        expect(outcome.trigger).toBe("INITIAL");
        expect(outcome.scope).toBe("BOUNDED");
        expect(outcome.order).toBeNull();
        expect(monitor.currentState).toBe("UNPLACED");
    });

    it("replaces the order deeper when protection thins out", async () => {
        const oldId = await placeFirstOrder();
        exchange.setBook("m1", [
            { price: 0.5, sizeUsd: 200 },
            { price: 0.48, sizeUsd: 400 },
            { price: 0.47, sizeUsd: 300 }
        ]);

        const replaced = expectKind(await monitor.tick(), "REPLACED");
        expect(replaced.trigger).toBe("INSUFFICIENT_PROTECTION");
        expect(replaced.oldOrder.orderId).toBe(oldId);
        expect(replaced.oldOrder.price).toBe(0.49);
        expect(replaced.order.price).toBe(0.48);
        expect(replaced.order.rank).toBe(2);
        expect(replaced.before.rank).toBe(2);
        expect(exchange.getOrder(oldId)?.status).toBe("CANCELED");
        expect(exchange.liveOrders("m1").map(o => o.price)).toEqual([0.48]);
        expect(monitor.currentOrder?.price).toBe(0.48);
    });

    it("keeps the order when nothing in the whole book is protected enough", async () => {
        const id = await placeFirstOrder();
        exchange.setBook("m1", [{ price: 0.5, sizeUsd: 100 }]);
        const outcome = expectKind(await monitor.tick(), "NOT_FOUND_IN_RANGE");
        expect(outcome.trigger).toBe("INSUFFICIENT_PROTECTION");
        expect(outcome.scope).toBe("UNBOUNDED");
        expect(outcome.order?.orderId).toBe(id);
        expect(exchange.getOrder(id)?.status).toBe("LIVE");
    });

    it("closes on a full fill found by polling", async () => {
        const id = await placeFirstOrder();
        exchange.fill(id, 102.04);

        const outcome = expectKind(await monitor.tick(), "FILL_DETECTED");
        expect(outcome.fill.verdict).toEqual({ kind: "FULL_FILL", amountFilled: 102.04 });
        expect(outcome.fill.detectedDuring).toBe("POLL");
        expect(outcome.fill.residualCanceled).toBeNull();
        expect(outcome.fill.rawStatus).toBe("MATCHED");
        expect(monitor.currentState).toBe("CLOSED");
        expect(monitor.currentOrder).toBeNull();
        expect((await monitor.tick()).kind).toBe("CLOSED");
    });

    it("cancels the live residual of a partial fill", async () => {
        const id = await placeFirstOrder();
        exchange.fill(id, 40);

        const outcome = expectKind(await monitor.tick(), "FILL_DETECTED");
        expect(outcome.fill.verdict).toEqual({ kind: "PARTIAL_FILL", amountFilled: 40 });
        expect(outcome.fill.residualCanceled).toBe(true);
        expect(exchange.getOrder(id)?.status).toBe("CANCELED");
    });

    it("reports a residual that could not be canceled", async () => {
        const id = await placeFirstOrder();
        exchange.fill(id, 40);
        exchange.failNext("cancelOrder", new NetworkError("socket hang up"));

        const outcome = expectKind(await monitor.tick(), "FILL_DETECTED");
        expect(outcome.fill.residualCanceled).toBe(false);
        expect(outcome.fill.residualError).toBe("socket hang up");
    });

    it("detects a fill that lands while the order is being replaced", async () => {
        const id = await placeFirstOrder();
        exchange.onCancel(order => exchange.fill(order.orderId, order.shares));
        exchange.setBook("m1", [
            { price: 0.5, sizeUsd: 200 },
            { price: 0.48, sizeUsd: 400 }
        ]);

        const outcome = expectKind(await monitor.tick(), "FILL_DETECTED");
        expect(outcome.fill.detectedDuring).toBe("REPLACE");
        expect(outcome.fill.verdict.kind).toBe("FULL_FILL");
        expect(outcome.fill.order.orderId).toBe(id);
        expect(exchange.liveOrders()).toHaveLength(0);
        expect(monitor.currentState).toBe("CLOSED");
    });

    it("verifies a canceled order on the next tick when the status read failed", async () => {
        const id = await placeFirstOrder();
        exchange.onCancel(order => {
            exchange.fill(order.orderId, 30);
            exchange.failNext("getOrderStatus", new NetworkError("read failed"));
        });
        exchange.setBook("m1", [
            { price: 0.5, sizeUsd: 200 },
            { price: 0.48, sizeUsd: 400 }
        ]);

        const failed = expectKind(await monitor.tick(), "TRANSIENT_ERROR");
        expect(failed.error.message).toBe("read failed");
        expect(monitor.currentOrder).toBeNull();

        const outcome = expectKind(await monitor.tick(), "FILL_DETECTED");
        expect(outcome.fill.order.orderId).toBe(id);
        expect(outcome.fill.verdict).toEqual({ kind: "PARTIAL_FILL", amountFilled: 30 });
        expect(outcome.fill.detectedDuring).toBe("REPLACE");
        expect(outcome.fill.residualCanceled).toBeNull();
        expect(exchange.liveOrders()).toHaveLength(0);
    });

    it("reports a replacement that could not be placed", async () => {
        const oldId = await placeFirstOrder();
        exchange.setBook("m1", [
            { price: 0.5, sizeUsd: 200 },
            { price: 0.48, sizeUsd: 400 }
        ]);
        exchange.failNext("placeOrder", new NetworkError("gateway timeout"));

        const outcome = expectKind(await monitor.tick(), "REPLACE_FAILED");
        expect(outcome.oldOrder.orderId).toBe(oldId);
        expect(outcome.error).toBeInstanceOf(ReplaceRaceError);
        expect(monitor.currentState).toBe("UNPLACED");
        expect(exchange.liveOrders()).toHaveLength(0);

        expect(expectKind(await monitor.tick(), "PLACED").order.price).toBe(0.48);
    });

    it("re-places an order canceled outside the bot", async () => {
        const id = await placeFirstOrder();
        exchange.cancelExternally(id);

        const lost = expectKind(await monitor.tick(), "ORDER_LOST");
        expect(lost.order.orderId).toBe(id);
        expect(lost.rawStatus).toBe("CANCELED");
        expect(monitor.currentState).toBe("UNPLACED");

        expect((await monitor.tick()).kind).toBe("PLACED");
    });

    it("absorbs transient failures", async () => {
        exchange.failNext("fetchOrderBook", new NetworkError("ECONNRESET"));
        const outcome = expectKind(await monitor.tick(), "TRANSIENT_ERROR");
        expect(outcome.error.code).toBe("NETWORK");
        expect(monitor.currentState).toBe("UNPLACED");
        expect((await monitor.tick()).kind).toBe("PLACED");
    });

    it("times out a hanging call", async () => {
        const hanging = new OrderLifecycleMonitor(market, { ...config, requestTimeoutMs: 20 }, {
            marketData: { fetchOrderBook: () => new Promise<OrderBook>(() => undefined) },
            execution: exchange
        });
        const outcome = expectKind(await hanging.tick(), "TRANSIENT_ERROR");
        expect(outcome.error.code).toBe("TIMEOUT");
    });

    it("closes for good on an auth failure", async () => {
        exchange.failNext("placeOrder", new AuthError("invalid api key"));
        const outcome = expectKind(await monitor.tick(), "FATAL");
        expect(outcome.error.code).toBe("AUTH");
        expect(monitor.currentState).toBe("CLOSED");
        expect(monitor.resume()).toBe(false);
    });

    it("resumes only after a fill", async () => {
        expect(monitor.resume()).toBe(false);
        const id = await placeFirstOrder();
        exchange.fill(id, 102.04);
        await monitor.tick();
        expect(monitor.resume()).toBe(true);
        expect(monitor.currentState).toBe("UNPLACED");
        expect((await monitor.tick()).kind).toBe("PLACED");
    });

    it("moves an order that slipped past the rank bound back to the top", async () => {
        const tickMarket = exchange.addMarket({
            marketId: "m2",
            tickSize: 0.001,
            levels: [
                { price: 0.352, sizeUsd: 100 },
                { price: 0.351, sizeUsd: 100 },
                { price: 0.35, sizeUsd: 100 },
                { price: 0.348, sizeUsd: 100 },
                { price: 0.346, sizeUsd: 300 }
            ]
        });
        const deep = new OrderLifecycleMonitor(tickMarket, config, { marketData: exchange, execution: exchange });
        const placed = expectKind(await deep.tick(), "PLACED");
        expect(placed.order.price).toBe(0.346);
        expect(placed.order.rank).toBe(5);

        exchange.setBook("m2", [
            { price: 0.352, sizeUsd: 800 },
            { price: 0.351, sizeUsd: 100 },
            { price: 0.35, sizeUsd: 100 },
            { price: 0.349, sizeUsd: 100 },
            { price: 0.348, sizeUsd: 100 },
            { price: 0.346, sizeUsd: 50 }
        ]);

        const replaced = expectKind(await deep.tick(), "REPLACED");
        expect(replaced.trigger).toBe("RANK_EXCEEDED");
        expect(replaced.before.rank).toBe(6);
        expect(replaced.before.protectionAhead).toBeCloseTo(1200, 6);
        expect(replaced.oldOrder.orderId).toBe(placed.order.orderId);
        expect(replaced.order.price).toBe(0.351);
        expect(replaced.order.rank).toBe(1);
        expect(replaced.protection).toBeCloseTo(800, 6);

        expect(exchange.getOrder(placed.order.orderId)?.status).toBe("CANCELED");
        const live = exchange.liveOrders("m2");
        expect(live).toHaveLength(1);
        expect(live[0].orderId).toBe(replaced.order.orderId);
        expect(live[0].price).toBe(0.351);
        expect(deep.currentOrder?.orderId).toBe(replaced.order.orderId);
    });

    it("cancels the resting order on shutdown", async () => {
        const id = await placeFirstOrder();
        const report = await monitor.shutdown();
        expect(report.canceled?.orderId).toBe(id);
        expect(report.fills).toEqual([]);
        expect(report.errors).toEqual([]);
        expect(exchange.getOrder(id)?.status).toBe("CANCELED");
        expect(monitor.currentState).toBe("CLOSED");
        expect(monitor.currentOrder).toBeNull();
    });

    it("reports a fill that landed after the last tick when shutting down", async () => {
        const id = await placeFirstOrder();
        exchange.fill(id, 60);

        const report = await monitor.shutdown();

        expect(report.canceled?.orderId).toBe(id);
        expect(report.fills).toHaveLength(1);
        expect(report.fills[0].order.orderId).toBe(id);
        expect(report.fills[0].verdict).toEqual({ kind: "PARTIAL_FILL", amountFilled: 60 });
        expect(report.fills[0].detectedDuring).toBe("SHUTDOWN");
        expect(report.fills[0].residualCanceled).toBe(true);
        expect(exchange.getOrder(id)?.status).toBe("CANCELED");
    });

    it("verifies a canceled order still awaiting its status read when shutting down", async () => {
        const id = await placeFirstOrder();
        exchange.onCancel(order => {
            exchange.fill(order.orderId, 30);
            exchange.failNext("getOrderStatus", new NetworkError("read failed"));
        });
        exchange.setBook("m1", [
            { price: 0.5, sizeUsd: 200 },
            { price: 0.48, sizeUsd: 400 }
        ]);
        expectKind(await monitor.tick(), "TRANSIENT_ERROR");

        const report = await monitor.shutdown();

        expect(report.canceled).toBeNull();
        expect(report.fills).toHaveLength(1);
        expect(report.fills[0].order.orderId).toBe(id);
        expect(report.fills[0].verdict).toEqual({ kind: "PARTIAL_FILL", amountFilled: 30 });
        expect(report.fills[0].residualCanceled).toBeNull();
    });

    it("reports a cancel that failed on shutdown", async () => {
        const id = await placeFirstOrder();
        exchange.failNext("cancelOrder", new NetworkError("socket hang up"));

        const report = await monitor.shutdown();

        expect(report.canceled).toBeNull();
        expect(report.fills).toEqual([]);
        expect(report.errors.map(e => e.message)).toEqual(["socket hang up"]);
        expect(exchange.getOrder(id)?.status).toBe("LIVE");
    });
});
