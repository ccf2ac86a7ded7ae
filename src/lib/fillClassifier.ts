/**
 * Fill detection
 *
 * The verdict comes from the filled amount. Exchanges report a partially filled
 * order whose remainder was later canceled as CANCELED, and that order still
 * traded, so the status code alone is never trusted.
 */

export type FillVerdict =
    | { kind: "NO_FILL" }
    | { kind: "PARTIAL_FILL"; amountFilled: number }
    | { kind: "FULL_FILL"; amountFilled: number };

export type OrderStatus = "OPEN" | "FILLED" | "CANCELED" | "UNKNOWN";

export type RawOrderStatus = string | number | null | undefined;

/** CLOB sizes carry two decimals. */
export const MIN_TRADABLE_SIZE = 0.01;

export function classifyFill(
    rawStatus: RawOrderStatus,
    filledAmount: number,
    orderedAmount: number,
    epsilon: number = MIN_TRADABLE_SIZE
): FillVerdict {
    if (!(filledAmount > 0)) return { kind: "NO_FILL" };
    if (filledAmount >= orderedAmount - epsilon) return { kind: "FULL_FILL", amountFilled: filledAmount };
    return { kind: "PARTIAL_FILL", amountFilled: filledAmount };
}

const OPEN_STATUSES = new Set(["live", "open", "pending", "delayed", "unmatched", "partially_filled", "1"]);
const FILLED_STATUSES = new Set(["matched", "filled", "3"]);
const CANCELED_STATUSES = new Set(["canceled", "cancelled", "expired", "rejected", "canceled_market_resolved", "2", "4"]);

/** Maps whatever the exchange reports (CLOB strings, legacy numeric codes) to a closed status. */
export function normalizeOrderStatus(rawStatus: RawOrderStatus): OrderStatus {
    if (rawStatus === null || rawStatus === undefined) return "UNKNOWN";
    const key = String(rawStatus).trim().toLowerCase().replace(/^order_status_/, "");
    if (OPEN_STATUSES.has(key)) return "OPEN";
    if (FILLED_STATUSES.has(key)) return "FILLED";
    if (CANCELED_STATUSES.has(key)) return "CANCELED";
    return "UNKNOWN";
}

export function isFill(verdict: FillVerdict): verdict is Exclude<FillVerdict, { kind: "NO_FILL" }> {
    return verdict.kind !== "NO_FILL";
}
