import { MarketNotFoundError, NetworkError } from "../lib/errors.js";
import { createOrderBook, roundToTick, samePrice } from "../lib/orderbook.js";
import type { OrderBook } from "../lib/orderbook.js";
import { usdToShares } from "./exchange.js";
import type {
    BookSide,
    MarketDataSource,
    MarketInfo,
    MarketResolver,
    OrderExecutionClient,
    OrderStatusReport,
    PlaceOrderRequest
} from "./types.js";

export interface SimLevel {
    price: number;
    sizeUsd: number;
}

export interface SimulatedMarket {
    marketId: string;
    title?: string;
    tickSize?: number;
    negRisk?: boolean;
    levels?: SimLevel[];
}

export type SimOrderStatus = "LIVE" | "MATCHED" | "CANCELED";

export interface SimOrder {
    orderId: string;
    marketId: string;
    price: number;
    sizeUsd: number;
    shares: number;
    filled: number;
    status: SimOrderStatus;
}

export type SimMethod = "fetchOrderBook" | "placeOrder" | "cancelOrder" | "getOrderStatus" | "getCollateralBalance";

export interface SimulatedExchangeOptions {
    markets?: SimulatedMarket[];
    balance?: number;
    // chance per book fetch that the book moves one tick
    volatility?: number;
    // chance per status read that a live order fills completely
    fillProbability?: number;
    random?: () => number;
}

const DEFAULT_TICK = 0.01;
const DEFAULT_SIZES = [300, 250, 400, 150, 600, 200, 350, 500, 250, 300];

export function defaultLevels(bestBid: number = 0.5, tickSize: number = DEFAULT_TICK): SimLevel[] {
    return DEFAULT_SIZES.map((sizeUsd, i) => ({ price: roundToTick(bestBid - i * tickSize, tickSize), sizeUsd }));
}

/**
 * In-process exchange for `--sim` runs and tests. Books hold other traders'
 * liquidity; live simulated orders are added on top when a book is fetched.
 */
export class SimulatedExchange implements MarketDataSource, OrderExecutionClient, MarketResolver {
    private readonly markets = new Map<string, MarketInfo>();
    private readonly books = new Map<string, SimLevel[]>();
    private readonly orders = new Map<string, SimOrder>();
    private readonly failures = new Map<SimMethod, unknown[]>();
    private readonly volatility: number;
    private readonly fillProbability: number;
    private readonly random: () => number;
    private readonly balance: number;
    private nextId = 1;
    private cancelHook: ((order: SimOrder) => void) | null = null;

    constructor(opts: SimulatedExchangeOptions = {}) {
        this.balance = opts.balance ?? 1000;
        this.volatility = opts.volatility ?? 0;
        this.fillProbability = opts.fillProbability ?? 0;
        this.random = opts.random ?? Math.random;
        for (const market of opts.markets ?? []) this.addMarket(market);
    }

    addMarket(market: SimulatedMarket): MarketInfo {
        const tickSize = market.tickSize ?? DEFAULT_TICK;
        const info: MarketInfo = {
            marketId: market.marketId,
            title: market.title ?? `Simulated market ${market.marketId}`,
            tokenId: `sim-${market.marketId}`,
            tickSize,
            negRisk: market.negRisk ?? false
        };
        this.markets.set(market.marketId, info);
        this.books.set(market.marketId, market.levels ?? defaultLevels(0.5, tickSize));
        return info;
    }

    async resolveMarket(ref: string): Promise<MarketInfo> {
        return this.markets.get(ref) ?? this.addMarket({ marketId: ref });
    }

    async fetchOrderBook(marketId: string, _side: BookSide): Promise<OrderBook> {
        this.maybeFail("fetchOrderBook");
        const market = this.markets.get(marketId);
        const levels = this.books.get(marketId);
        if (!market || !levels) throw new MarketNotFoundError(marketId);

        if (this.volatility > 0 && this.random() < this.volatility) {
            this.shiftBook(marketId, this.random() < 0.5 ? -1 : 1);
        }

        const raw = this.currentLevels(marketId).map(level => ({
            price: level.price,
            size: level.sizeUsd / level.price
        }));
        return createOrderBook(marketId, raw, market.tickSize);
    }

    async placeOrder(request: PlaceOrderRequest): Promise<string> {
        this.maybeFail("placeOrder");
        if (!this.markets.has(request.marketId)) throw new MarketNotFoundError(request.marketId);
        const orderId = `sim-order-${this.nextId++}`;
        this.orders.set(orderId, {
            orderId,
            marketId: request.marketId,
            price: request.price,
            sizeUsd: request.sizeUsd,
            shares: usdToShares(request.sizeUsd, request.price),
            filled: 0,
            status: "LIVE"
        });
        return orderId;
    }

    async cancelOrder(orderId: string): Promise<void> {
        this.maybeFail("cancelOrder");
        const order = this.orders.get(orderId);
        if (!order) return;
        if (this.cancelHook) this.cancelHook(order);
        if (order.status === "LIVE") order.status = "CANCELED";
    }

    async getOrderStatus(orderId: string): Promise<OrderStatusReport> {
        this.maybeFail("getOrderStatus");
        const order = this.orders.get(orderId);
        if (!order) throw new NetworkError(`Order ${orderId} not found`);
        if (order.status === "LIVE" && this.fillProbability > 0 && this.random() < this.fillProbability) {
            this.fill(orderId, order.shares - order.filled);
        }
        return { rawStatus: order.status, filledAmount: order.filled, orderedAmount: order.shares };
    }

    async getCollateralBalance(): Promise<number | null> {
        this.maybeFail("getCollateralBalance");
        return this.balance;
    }

    // --- scenario controls ---

    setBook(marketId: string, levels: SimLevel[]): void {
        if (!this.markets.has(marketId)) throw new MarketNotFoundError(marketId);
        this.books.set(marketId, levels.map(level => ({ ...level })));
    }

    /** Moves every level by `ticks`; levels pushed outside (0, 1) disappear. */
    shiftBook(marketId: string, ticks: number): void {
        const market = this.markets.get(marketId);
        const levels = this.books.get(marketId);
        if (!market || !levels) throw new MarketNotFoundError(marketId);
        const shifted = levels
            .map(level => ({ ...level, price: roundToTick(level.price + ticks * market.tickSize, market.tickSize) }))
            .filter(level => level.price > 0 && level.price < 1);
        this.books.set(marketId, shifted);
    }

    /** Matches `shares` of a live order; a completely matched order becomes MATCHED. */
    fill(orderId: string, shares: number): void {
        const order = this.orders.get(orderId);
        if (!order) throw new Error(`Unknown order ${orderId}`);
        order.filled = Math.min(order.shares, Number((order.filled + shares).toFixed(2)));
        if (order.filled >= order.shares) order.status = "MATCHED";
    }

    cancelExternally(orderId: string): void {
        const order = this.orders.get(orderId);
        if (order && order.status === "LIVE") order.status = "CANCELED";
    }

    /** Runs before a cancel is applied, e.g. to fill the order in the cancel window. */
    onCancel(hook: ((order: SimOrder) => void) | null): void {
        this.cancelHook = hook;
    }

    /** Queues an error for the next call to `method`. */
    failNext(method: SimMethod, error: unknown): void {
        const queue = this.failures.get(method) ?? [];
        queue.push(error);
        this.failures.set(method, queue);
    }

    getOrder(orderId: string): SimOrder | undefined {
        return this.orders.get(orderId);
    }

    liveOrders(marketId?: string): SimOrder[] {
        return [...this.orders.values()].filter(o => o.status === "LIVE" && (!marketId || o.marketId === marketId));
    }

    private currentLevels(marketId: string): SimLevel[] {
        const market = this.markets.get(marketId);
        const levels = (this.books.get(marketId) ?? []).map(level => ({ ...level }));
        if (!market) return levels;
        for (const order of this.liveOrders(marketId)) {
            const remainingUsd = (order.shares - order.filled) * order.price;
            const level = levels.find(l => samePrice(l.price, order.price, market.tickSize));
            if (level) level.sizeUsd += remainingUsd;
            else levels.push({ price: order.price, sizeUsd: remainingUsd });
        }
        return levels;
    }

    private maybeFail(method: SimMethod): void {
        const queue = this.failures.get(method);
        if (queue && queue.length > 0) throw queue.shift();
    }
}
