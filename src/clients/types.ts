import type { OrderBook } from "../lib/orderbook.js";
import type { RawOrderStatus } from "../lib/fillClassifier.js";

export type BookSide = "BID";
export type Outcome = "YES";
export type OrderSide = "BUY";

export interface MarketInfo {
    marketId: string;   // id or slug as configured
    title: string;
    tokenId: string;    // YES outcome token
    tickSize: number;
    negRisk: boolean;
}

export interface PlaceOrderRequest {
    marketId: string;
    outcome: Outcome;
    side: OrderSide;
    price: number;
    sizeUsd: number;
}

export interface OrderStatusReport {
    rawStatus: RawOrderStatus;
    filledAmount: number;   // exchange size units (shares on the CLOB)
    orderedAmount: number;  // same units as filledAmount
}

/** Fails with NetworkError or MarketNotFoundError. */
export interface MarketDataSource {
    fetchOrderBook(marketId: string, side: BookSide): Promise<OrderBook>;
}

/** Fails with AuthError (fatal), RateLimitedError or NetworkError. */
export interface OrderExecutionClient {
    placeOrder(request: PlaceOrderRequest): Promise<string>;
    cancelOrder(orderId: string): Promise<void>;
    getOrderStatus(orderId: string): Promise<OrderStatusReport>;
    getCollateralBalance(): Promise<number | null>;
}

export type AlertSeverity = "INFO" | "WARNING" | "CRITICAL";

export interface AlertChannel {
    notify(severity: AlertSeverity, message: string): Promise<void>;
}

/** Turns a configured market id or slug into the YES token and order parameters. */
export interface MarketResolver {
    resolveMarket(ref: string): Promise<MarketInfo>;
}
