/**
 * Bid-side order book snapshot
 *
 * Levels are valued in USD notional (price × shares), which is the unit the
 * protection amount is configured in.
 */

export interface PriceLevel {
    readonly price: number;
    readonly size: number; // USD resting at this price
}

export interface OrderBook {
    readonly marketId: string;
    readonly tickSize: number;
    readonly bids: readonly PriceLevel[]; // best (highest) first
    readonly fetchedAt: number;
}

/** Level as it comes off the wire: CLOB books quote price and size in shares as strings. */
export interface OrderbookSide {
    price: string | number;
    size: string | number;
}

/**
 * Builds a frozen snapshot from raw bid levels.
 * Sorts best-to-worst, merges duplicate prices and drops empty or malformed levels.
 */
export function createOrderBook(
    marketId: string,
    rawBids: readonly OrderbookSide[],
    tickSize: number,
    fetchedAt: number = Date.now()
): OrderBook {
    const byPrice = new Map<number, number>();

    for (const bid of rawBids) {
        const price = roundToTick(Number(bid.price), tickSize);
        const shares = Number(bid.size);
        if (!Number.isFinite(price) || !Number.isFinite(shares) || price <= 0 || shares <= 0) continue;
        byPrice.set(price, (byPrice.get(price) ?? 0) + price * shares);
    }

    const bids = [...byPrice.entries()]
        .sort((a, b) => b[0] - a[0])
        .map(([price, size]) => Object.freeze({ price, size }));

    return Object.freeze({ marketId, tickSize, bids: Object.freeze(bids), fetchedAt });
}

export function bestBid(book: OrderBook): number | null {
    return book.bids.length > 0 ? book.bids[0].price : null;
}

export function tickDecimals(tickSize: number): number {
    const text = String(tickSize);
    const dot = text.indexOf(".");
    return dot === -1 ? 0 : text.length - dot - 1;
}

export function roundToTick(price: number, tickSize: number): number {
    return Number((Math.round(price / tickSize) * tickSize).toFixed(tickDecimals(tickSize)));
}

/** Tolerance for price equality: a tenth of a tick. */
export function priceEpsilon(tickSize: number): number {
    return tickSize / 10;
}

export function samePrice(a: number, b: number, tickSize: number): boolean {
    return Math.abs(a - b) < priceEpsilon(tickSize);
}

/**
 * Removes our own resting size from the level it sits on.
 * Used before a rescan so a replacement is never placed behind the order it replaces.
 */
export function excludeOwnOrder(book: OrderBook, ownPrice: number, ownSizeUsd: number): OrderBook {
    const bids: PriceLevel[] = [];
    for (const level of book.bids) {
        if (!samePrice(level.price, ownPrice, book.tickSize)) {
            bids.push(level);
            continue;
        }
        const remaining = level.size - ownSizeUsd;
        if (remaining > 1e-9) bids.push(Object.freeze({ price: level.price, size: remaining }));
    }
    return Object.freeze({ ...book, bids: Object.freeze(bids) });
}

/**
 * Human-readable depth ladder: one line per level with the cumulative protection.
 */
export function describeDepth(book: OrderBook, levels: number = 10): string[] {
    const decimals = Math.max(tickDecimals(book.tickSize), 2);
    let cumulative = 0;
    return book.bids.slice(0, levels).map((level, i) => {
        cumulative += level.size;
        return `bid${i + 1}: ${level.price.toFixed(decimals)} (level $${level.size.toFixed(0)} | cumulative $${cumulative.toFixed(0)})`;
    });
}
