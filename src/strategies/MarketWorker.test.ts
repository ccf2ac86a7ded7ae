import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SimulatedExchange } from "../clients/simulated.js";
import type { AlertChannel, AlertSeverity, MarketInfo } from "../clients/types.js";
import { AuthError } from "../lib/errors.js";
import { createSilentLogger } from "../lib/logger.js";
import { TradeLog } from "../lib/tradeLog.js";
import { MarketWorker } from "./MarketWorker.js";
import type { WorkerConfig } from "./MarketWorker.js";
import { OrderLifecycleMonitor } from "./OrderLifecycleMonitor.js";
import { OutcomeDispatcher } from "./OutcomeDispatcher.js";

class RecordingAlerts implements AlertChannel {
    readonly sent: Array<{ severity: AlertSeverity; message: string }> = [];

    async notify(severity: AlertSeverity, message: string): Promise<void> {
        this.sent.push({ severity, message });
    }
}

describe("MarketWorker", () => {
    let dir: string;
    let tradeLog: TradeLog;
    let alerts: RecordingAlerts;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "worker-"));
        tradeLog = new TradeLog(path.join(dir, "trades.jsonl"));
        alerts = new RecordingAlerts();
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function setup(exchange: SimulatedExchange, overrides: Partial<WorkerConfig> = {}) {
        const market: MarketInfo = exchange.addMarket({ marketId: "m1", levels: [{ price: 0.5, sizeUsd: 800 }] });
        const monitor = new OrderLifecycleMonitor(
            market,
            { minProtectionAmount: 500, firstOrderMaxRank: 5, orderSizeUsd: 50, requestTimeoutMs: 1000, fillEpsilon: 0.01 },
            { marketData: exchange, execution: exchange }
        );
        const dispatcher = new OutcomeDispatcher({ logger: createSilentLogger(), alerts, tradeLog, alertAfterFailures: 5 });
        const worker = new MarketWorker(
            market,
            monitor,
            dispatcher,
            { pollIntervalMs: 2, maxBackoffMs: 20, resumeAfterFill: false, ...overrides },
            createSilentLogger()
        );
        return { monitor, dispatcher, worker };
    }

    it("ends after the first fill", async () => {
        const exchange = new SimulatedExchange({ fillProbability: 1 });
        const { monitor, worker } = setup(exchange);

        await worker.start();

        expect(monitor.currentState).toBe("CLOSED");
        const trades = await tradeLog.readAll();
        expect(trades).toHaveLength(1);
        expect(trades[0].verdict).toBe("FULL_FILL");
        expect(trades[0].price).toBe(0.49);
    });

    it("starts a new cycle after a fill when configured to", async () => {
        const exchange = new SimulatedExchange({ fillProbability: 1 });
        const { worker } = setup(exchange, { resumeAfterFill: true });

        const loop = worker.start();
        await vi.waitFor(async () => {
            expect((await tradeLog.readAll()).length).toBeGreaterThanOrEqual(2);
        });
        await worker.stop();
        await loop;

        expect(exchange.liveOrders()).toHaveLength(0);
    });

    it("cancels the resting order when stopped", async () => {
        const exchange = new SimulatedExchange();
        const { monitor, worker } = setup(exchange);

        const loop = worker.start();
        await vi.waitFor(() => {
            expect(exchange.liveOrders("m1")).toHaveLength(1);
        });
        await worker.stop();
        await loop;

        expect(exchange.liveOrders("m1")).toHaveLength(0);
        expect(monitor.currentState).toBe("CLOSED");
    });

    it("records a fill that lands just before it is stopped", async () => {
        const exchange = new SimulatedExchange();
        const { worker, dispatcher } = setup(exchange);

        const loop = worker.start();
        await vi.waitFor(() => {
            expect(exchange.liveOrders("m1")).toHaveLength(1);
        });
        const id = exchange.liveOrders("m1")[0].orderId;
        exchange.fill(id, 60);
        await worker.stop();
        await loop;
        await dispatcher.flush();

        const trades = await tradeLog.readAll();
        expect(trades).toHaveLength(1);
        expect(trades[0].orderId).toBe(id);
        expect(trades[0].verdict).toBe("PARTIAL_FILL");
        expect(trades[0].filledAmount).toBe(60);
        expect(exchange.getOrder(id)?.status).toBe("CANCELED");
        expect(alerts.sent.some(a => a.message.startsWith("⚠️ <b>Partial fill</b>"))).toBe(true);
    });

    it("alerts when the shutdown cancel fails", async () => {
        const exchange = new SimulatedExchange();
        const { worker, dispatcher } = setup(exchange);

        const loop = worker.start();
        await vi.waitFor(() => {
            expect(exchange.liveOrders("m1")).toHaveLength(1);
        });
        exchange.failNext("cancelOrder", new AuthError("invalid api key"));
        await worker.stop();
        await loop;
        await dispatcher.flush();

        const critical = alerts.sent.filter(a => a.severity === "CRITICAL");
        expect(critical).toHaveLength(1);
        expect(critical[0].message).toContain("Shutdown cleanup failed");
        expect(exchange.liveOrders("m1")).toHaveLength(1);
    });

    it("stops its market on a fatal error", async () => {
        const exchange = new SimulatedExchange();
        const { monitor, worker, dispatcher } = setup(exchange);
        exchange.failNext("placeOrder", new AuthError("invalid api key"));

        await worker.start();
        await dispatcher.flush();

        expect(worker.fatalError?.code).toBe("AUTH");
        expect(monitor.currentState).toBe("CLOSED");
        expect(alerts.sent.map(a => a.severity)).toEqual(["CRITICAL"]);
        expect(alerts.sent[0].message).toContain("Market worker stopped");
    });

    it("keeps ticking through transient failures", async () => {
        const exchange = new SimulatedExchange();
        const { worker } = setup(exchange);
        const boom = new Error("ECONNRESET");
        exchange.failNext("fetchOrderBook", boom);
        exchange.failNext("fetchOrderBook", boom);

        const loop = worker.start();
        await vi.waitFor(() => {
            expect(exchange.liveOrders("m1")).toHaveLength(1);
        });
        await worker.stop();
        await loop;
    });
});
