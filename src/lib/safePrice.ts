import { roundToTick } from "./orderbook.js";
import type { OrderBook } from "./orderbook.js";

export interface SafePrice {
    price: number;
    rank: number;       // 1-based level the protection was satisfied at
    protection: number; // cumulative USD up to and including that level
}

const AMOUNT_EPSILON = 1e-9;

/**
 * Finds the shallowest bid price with at least `minProtection` USD resting ahead of it.
 *
 * Walks levels best-to-worst accumulating size. The first level where the cumulative
 * amount reaches the threshold decides the price:
 * - rank 1: one tick below the best bid (we never post at the best bid itself)
 * - rank r > 1: exactly that level's price
 *
 * `maxRank` bounds the search; `null` searches the whole book.
 */
export function computeSafePrice(book: OrderBook, minProtection: number, maxRank: number | null): SafePrice | null {
    if (book.bids.length === 0) return null;
    if (maxRank !== null && maxRank <= 0) return null;

    let cumulative = 0;
    for (let i = 0; i < book.bids.length; i++) {
        const rank = i + 1;
        if (maxRank !== null && rank > maxRank) return null;

        const level = book.bids[i];
        cumulative += level.size;
        if (cumulative + AMOUNT_EPSILON < minProtection) continue;

        if (rank === 1) {
            const price = roundToTick(level.price - book.tickSize, book.tickSize);
            // best bid already sits on the lowest tick: nothing valid below it
            if (price < book.tickSize) return null;
            return { price, rank: 1, protection: cumulative };
        }
        return { price: level.price, rank, protection: cumulative };
    }
    return null;
}
