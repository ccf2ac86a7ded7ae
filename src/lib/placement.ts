import { excludeOwnOrder, samePrice } from "./orderbook.js";
import { computeSafePrice } from "./safePrice.js";
import { evaluateRankProtection } from "./rankProtection.js";
import type { OrderBook } from "./orderbook.js";
import type { RankProtection } from "./rankProtection.js";

export interface ProtectionConfig {
    readonly minProtectionAmount: number;
    readonly firstOrderMaxRank: number;
    readonly orderSizeUsd: number;
}

export interface RestingOrderRef {
    orderId: string;
    price: number;
    sizeUsd: number;
}

export type AdjustTrigger = "INITIAL" | "INSUFFICIENT_PROTECTION" | "RANK_EXCEEDED";
export type SearchScope = "BOUNDED" | "UNBOUNDED";

export type PlacementDecision =
    | { kind: "NO_ACTION"; current: RankProtection | null }
    | { kind: "PLACE"; price: number; rank: number; protection: number }
    | {
          kind: "REPLACE";
          oldOrderId: string;
          newPrice: number;
          newRank: number;
          protection: number;
          trigger: Exclude<AdjustTrigger, "INITIAL">;
          current: RankProtection;
      }
    | { kind: "NOT_FOUND_IN_RANGE"; trigger: AdjustTrigger; scope: SearchScope; current: RankProtection | null };

/**
 * Decides what to do with a market's single order given a fresh book.
 *
 * Without an order: bounded search over [1, firstOrderMaxRank].
 * With an order, triggers are checked in priority order:
 *   1. protection ahead below the minimum: search the whole book
 *   2. rank beyond firstOrderMaxRank: search [1, firstOrderMaxRank]
 * A trigger that finds no level, or finds our current price, never cancels.
 */
export function decidePlacement(book: OrderBook, config: ProtectionConfig, order: RestingOrderRef | null): PlacementDecision {
    if (order === null) {
        const target = computeSafePrice(book, config.minProtectionAmount, config.firstOrderMaxRank);
        if (!target) return { kind: "NOT_FOUND_IN_RANGE", trigger: "INITIAL", scope: "BOUNDED", current: null };
        return { kind: "PLACE", price: target.price, rank: target.rank, protection: target.protection };
    }

    const current = evaluateRankProtection(book, order.price, order.sizeUsd);

    let trigger: Exclude<AdjustTrigger, "INITIAL">;
    let maxRank: number | null;
    if (current.protectionAhead < config.minProtectionAmount) {
        trigger = "INSUFFICIENT_PROTECTION";
        maxRank = null;
    } else if (current.rank > config.firstOrderMaxRank) {
        trigger = "RANK_EXCEEDED";
        maxRank = config.firstOrderMaxRank;
    } else {
        return { kind: "NO_ACTION", current };
    }

    const others = excludeOwnOrder(book, order.price, order.sizeUsd);
    const target = computeSafePrice(others, config.minProtectionAmount, maxRank);
    if (!target) {
        return { kind: "NOT_FOUND_IN_RANGE", trigger, scope: maxRank === null ? "UNBOUNDED" : "BOUNDED", current };
    }
    if (samePrice(target.price, order.price, book.tickSize)) return { kind: "NO_ACTION", current };

    return {
        kind: "REPLACE",
        oldOrderId: order.orderId,
        newPrice: target.price,
        newRank: target.rank,
        protection: target.protection,
        trigger,
        current
    };
}
