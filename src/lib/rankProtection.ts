import { priceEpsilon, samePrice } from "./orderbook.js";
import type { OrderBook } from "./orderbook.js";

export interface RankProtection {
    rank: number;            // live queue position by price level
    protectionAhead: number; // USD resting at strictly better prices
    queuedAtPrice: number;   // USD of other orders sharing our price level
}

/**
 * Live rank and protection of a resting bid at `ownPrice`.
 *
 * Only levels strictly above our price count as protection, so our own size
 * never shields itself. `ownSize` is taken out of our level to report how much
 * competing size shares the price with us.
 */
export function evaluateRankProtection(book: OrderBook, ownPrice: number, ownSize: number): RankProtection {
    const eps = priceEpsilon(book.tickSize);
    let rank = 1;
    let protectionAhead = 0;
    let queuedAtPrice = 0;

    for (const level of book.bids) {
        if (level.price > ownPrice + eps) {
            rank++;
            protectionAhead += level.size;
        } else if (samePrice(level.price, ownPrice, book.tickSize)) {
            queuedAtPrice = Math.max(0, level.size - ownSize);
        } else {
            break;
        }
    }

    return { rank, protectionAhead, queuedAtPrice };
}
