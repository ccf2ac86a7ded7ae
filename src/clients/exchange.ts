import { AssetType, OrderType, Side } from "@polymarket/clob-client";
import type { CreateOrderOptions, TickSize, UserOrder } from "@polymarket/clob-client";
import { z } from "zod";

import { MarketNotFoundError, NetworkError, toMakerError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { createOrderBook } from "../lib/orderbook.js";
import type { OrderBook } from "../lib/orderbook.js";
import type { GammaClient } from "./gamma-api.js";
import type {
    BookSide,
    MarketDataSource,
    MarketInfo,
    MarketResolver,
    OrderExecutionClient,
    OrderStatusReport,
    PlaceOrderRequest
} from "./types.js";

/** The part of the CLOB client the exchange uses. Responses are validated, not trusted. */
export interface ClobApi {
    getTickSize(tokenID: string): Promise<unknown>;
    getOrderBook(tokenID: string): Promise<unknown>;
    createAndPostOrder(order: UserOrder, options: Partial<CreateOrderOptions>, orderType: OrderType.GTC): Promise<unknown>;
    cancelOrder(payload: { orderID: string }): Promise<unknown>;
    getOrder(orderID: string): Promise<unknown>;
    getBalanceAllowance(params: { asset_type: AssetType }): Promise<unknown>;
}

const TICK_SIZES: readonly TickSize[] = ["0.1", "0.01", "0.001", "0.0001"];
const USDC_DECIMALS = 1e6;

const ErrorPayloadSchema = z.object({
    error: z.unknown(),
    status: z.number().optional()
});

const BookSchema = z.object({
    bids: z.array(z.object({ price: z.string(), size: z.string() })).default([])
});

const PostOrderSchema = z.object({
    success: z.boolean().optional(),
    orderID: z.string().optional(),
    errorMsg: z.string().optional()
});

const CancelSchema = z.object({
    canceled: z.array(z.string()).default([]),
    not_canceled: z.record(z.string()).default({})
});

const OpenOrderSchema = z.object({
    id: z.string(),
    status: z.string(),
    original_size: z.coerce.number(),
    size_matched: z.coerce.number()
});

const BalanceSchema = z.object({ balance: z.coerce.number() });

export function toTickSize(tickSize: number): TickSize {
    const match = TICK_SIZES.find(t => Math.abs(Number(t) - tickSize) < 1e-12);
    if (!match) throw new Error(`Unsupported tick size ${tickSize}`);
    return match;
}

/** USD notional to CLOB shares, rounded down to 2 decimals. */
export function usdToShares(sizeUsd: number, price: number): number {
    return Math.floor((sizeUsd / price) * 100 + 1e-9) / 100;
}

/**
 * Market data and order execution over the CLOB client, for the YES token of
 * each registered market. Markets must be resolved before use.
 */
export class ClobExchange implements MarketDataSource, OrderExecutionClient, MarketResolver {
    private readonly client: ClobApi;
    private readonly gamma: GammaClient;
    private readonly logger: Logger;
    private readonly markets = new Map<string, MarketInfo>();

    constructor(client: ClobApi, gamma: GammaClient, logger: Logger) {
        this.client = client;
        this.gamma = gamma;
        this.logger = logger.child({ component: "exchange" });
    }

    async resolveMarket(ref: string): Promise<MarketInfo> {
        const market = await this.gamma.getMarket(ref);
        if (market.closed) throw new MarketNotFoundError(ref, "market is closed");

        const tick = await this.request(() => this.client.getTickSize(market.yesTokenId), ref);
        const tickSize = typeof tick === "string" ? Number(tick) : (market.tickSize ?? 0.01);

        const info: MarketInfo = {
            marketId: ref,
            title: market.title,
            tokenId: market.yesTokenId,
            tickSize,
            negRisk: market.negRisk
        };
        this.markets.set(ref, info);
        this.logger.info({ market: ref, tokenId: info.tokenId, tickSize }, `Resolved "${info.title}"`);
        return info;
    }

    async fetchOrderBook(marketId: string, side: BookSide): Promise<OrderBook> {
        const market = this.marketFor(marketId);
        const raw = await this.request(() => this.client.getOrderBook(market.tokenId), marketId);
        const book = BookSchema.safeParse(raw);
        if (!book.success) throw new NetworkError(`Malformed ${side} book for ${marketId}`);
        return createOrderBook(marketId, book.data.bids, market.tickSize);
    }

    async placeOrder(request: PlaceOrderRequest): Promise<string> {
        const market = this.marketFor(request.marketId);
        const size = usdToShares(request.sizeUsd, request.price);
        const raw = await this.request(
            () =>
                this.client.createAndPostOrder(
                    { tokenID: market.tokenId, price: request.price, size, side: Side.BUY },
                    { tickSize: toTickSize(market.tickSize), negRisk: market.negRisk },
                    OrderType.GTC
                ),
            request.marketId
        );
        const posted = PostOrderSchema.safeParse(raw);
        if (!posted.success || !posted.data.orderID || posted.data.success === false) {
            const reason = posted.success ? (posted.data.errorMsg ?? "no order id returned") : "malformed response";
            throw toMakerError(new Error(`Order rejected: ${reason}`), { marketId: request.marketId });
        }
        this.logger.debug({ market: request.marketId, orderId: posted.data.orderID, price: request.price, size }, "Order posted");
        return posted.data.orderID;
    }

    async cancelOrder(orderId: string): Promise<void> {
        const raw = await this.request(() => this.client.cancelOrder({ orderID: orderId }));
        const result = CancelSchema.safeParse(raw);
        if (!result.success) throw new NetworkError(`Malformed cancel response for ${orderId}`);
        const reason = result.data.not_canceled[orderId];
        // already matched or canceled: the follow-up status read tells which
        if (reason) this.logger.debug({ orderId, reason }, "Cancel not applied");
    }

    async getOrderStatus(orderId: string): Promise<OrderStatusReport> {
        const raw = await this.request(() => this.client.getOrder(orderId));
        const order = OpenOrderSchema.safeParse(raw);
        if (!order.success) throw new NetworkError(`Order ${orderId} not readable`);
        return {
            rawStatus: order.data.status,
            filledAmount: order.data.size_matched,
            orderedAmount: order.data.original_size
        };
    }

    async getCollateralBalance(): Promise<number | null> {
        const raw = await this.request(() => this.client.getBalanceAllowance({ asset_type: AssetType.COLLATERAL }));
        const balance = BalanceSchema.safeParse(raw);
        return balance.success ? balance.data.balance / USDC_DECIMALS : null;
    }

    private marketFor(marketId: string): MarketInfo {
        const market = this.markets.get(marketId);
        if (!market) throw new MarketNotFoundError(marketId, "market was not resolved");
        return market;
    }

    /** The client reports HTTP failures as `{ error, status }` payloads instead of throwing. */
    private async request(call: () => Promise<unknown>, marketId?: string): Promise<unknown> {
        let result: unknown;
        try {
            result = await call();
        } catch (err) {
            throw toMakerError(err, { marketId });
        }
        const failure = ErrorPayloadSchema.safeParse(result);
        if (failure.success && failure.data.error !== undefined) {
            throw toMakerError(failure.data.error, { marketId, status: failure.data.status });
        }
        return result;
    }
}
