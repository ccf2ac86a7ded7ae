import { describe, expect, it } from "vitest";

import { bestBid, createOrderBook, describeDepth, excludeOwnOrder, roundToTick, samePrice, tickDecimals } from "./orderbook.js";

describe("createOrderBook", () => {
    it("values levels in USD, best first", () => {
        const book = createOrderBook("m1", [
            { price: "0.48", size: "100" },
            { price: "0.50", size: "20" }
        ], 0.01, 42);
        expect(book.bids).toEqual([
            { price: 0.5, size: 10 },
            { price: 0.48, size: 48 }
        ]);
        expect(book.fetchedAt).toBe(42);
        expect(bestBid(book)).toBe(0.5);
    });

    it("merges duplicate prices and drops malformed levels", () => {
        const book = createOrderBook("m1", [
            { price: "0.40", size: "10" },
            { price: 0.4, size: 15 },
            { price: "abc", size: "10" },
            { price: "0.39", size: "0" },
            { price: "0", size: "100" }
        ], 0.01);
        expect(book.bids).toEqual([{ price: 0.4, size: 10 }]);
    });

    it("freezes the snapshot", () => {
        const book = createOrderBook("m1", [{ price: "0.5", size: "2" }], 0.01);
        expect(Object.isFrozen(book)).toBe(true);
        expect(Object.isFrozen(book.bids)).toBe(true);
        expect(bestBid(createOrderBook("m1", [], 0.01))).toBeNull();
    });
});

describe("tick helpers", () => {
    it("rounds and compares on the tick grid", () => {
        expect(tickDecimals(0.001)).toBe(3);
        expect(tickDecimals(0.01)).toBe(2);
        expect(roundToTick(0.352 - 0.001, 0.001)).toBe(0.351);
        expect(samePrice(0.35, 0.3500001, 0.001)).toBe(true);
        expect(samePrice(0.35, 0.351, 0.001)).toBe(false);
    });
});

describe("excludeOwnOrder", () => {
    const book = createOrderBook("m1", [
        { price: "0.50", size: "200" },
        { price: "0.49", size: "200" }
    ], 0.01);

    it("removes our size from our level", () => {
        expect(excludeOwnOrder(book, 0.49, 50).bids).toEqual([
            { price: 0.5, size: 100 },
            { price: 0.49, size: 48 }
        ]);
    });

    it("drops the level when only we rest there", () => {
        expect(excludeOwnOrder(book, 0.5, 100).bids).toEqual([{ price: 0.49, size: 98 }]);
    });
});

describe("describeDepth", () => {
    it("lists each level with its cumulative protection", () => {
        const book = createOrderBook("m1", [
            { price: "0.5", size: "1600" },
            { price: "0.49", size: "800" }
        ], 0.01);
        expect(describeDepth(book)).toEqual([
            "bid1: 0.50 (level $800 | cumulative $800)",
            "bid2: 0.49 (level $392 | cumulative $1192)"
        ]);
    });
});
