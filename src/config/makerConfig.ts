import fs from "node:fs";

import { z } from "zod";

export const MAKER_DEFAULTS = {
    // Protection: USD that must rest at better prices than our bid
    MIN_PROTECTION_AMOUNT: 500,
    // Rank ceiling for the first order and for the rank-exceeded rescan ("check_bid_position")
    FIRST_ORDER_MAX_RANK: 10,
    ORDER_SIZE_USD: 50,

    // Scheduling
    POLL_INTERVAL_MS: 1000,
    REQUEST_TIMEOUT_MS: 15_000,
    MAX_BACKOFF_MS: 60_000,

    // Lifecycle
    RESUME_AFTER_FILL: false,
    FILL_EPSILON: 0.01,

    // Alerting
    ALERT_AFTER_FAILURES: 5,
    STATUS_REPORT_ENABLED: true
};

const MarketSettingsSchema = z.object({
    minProtectionAmount: z.number().positive(),
    firstOrderMaxRank: z.number().int().min(1),
    orderSizeUsd: z.number().positive(),
    pollIntervalMs: z.number().int().min(100),
    requestTimeoutMs: z.number().int().min(100),
    resumeAfterFill: z.boolean(),
    fillEpsilon: z.number().nonnegative()
});

export type MarketSettings = z.infer<typeof MarketSettingsSchema>;

export const MakerFileConfigSchema = z.object({
    defaults: MarketSettingsSchema.partial().default({}),
    markets: z
        .array(
            MarketSettingsSchema.partial().extend({
                id: z.union([z.string().min(1), z.number().int().positive()]).transform(String)
            })
        )
        .default([]),
    maxBackoffMs: z.number().int().min(1000).default(MAKER_DEFAULTS.MAX_BACKOFF_MS),
    alertAfterFailures: z.number().int().min(1).default(MAKER_DEFAULTS.ALERT_AFTER_FAILURES),
    statusReport: z.boolean().default(MAKER_DEFAULTS.STATUS_REPORT_ENABLED)
});

export type MakerFileConfig = z.infer<typeof MakerFileConfigSchema>;
type MarketEntry = MakerFileConfig["markets"][number];

export interface MarketConfig extends MarketSettings {
    readonly id: string;
}

export interface MakerConfig {
    markets: readonly MarketConfig[];
    maxBackoffMs: number;
    alertAfterFailures: number;
    statusReport: boolean;
}

const BUILTIN_SETTINGS: MarketSettings = {
    minProtectionAmount: MAKER_DEFAULTS.MIN_PROTECTION_AMOUNT,
    firstOrderMaxRank: MAKER_DEFAULTS.FIRST_ORDER_MAX_RANK,
    orderSizeUsd: MAKER_DEFAULTS.ORDER_SIZE_USD,
    pollIntervalMs: MAKER_DEFAULTS.POLL_INTERVAL_MS,
    requestTimeoutMs: MAKER_DEFAULTS.REQUEST_TIMEOUT_MS,
    resumeAfterFill: MAKER_DEFAULTS.RESUME_AFTER_FILL,
    fillEpsilon: MAKER_DEFAULTS.FILL_EPSILON
};

/**
 * Resolves per-market settings: built-in defaults < file defaults < market overrides.
 * `marketIds` (from the command line) replaces the file's market list, keeping any
 * overrides the file has for those ids.
 */
export function resolveMakerConfig(raw: unknown, marketIds?: readonly string[]): MakerConfig {
    const file = MakerFileConfigSchema.parse(raw);
    const base = mergeSettings(BUILTIN_SETTINGS, file.defaults);

    const entries: MarketEntry[] = marketIds && marketIds.length > 0
        ? marketIds.map(id => file.markets.find(m => m.id === id) ?? { id })
        : file.markets;

    const seen = new Set<string>();
    const markets: MarketConfig[] = [];
    for (const entry of entries) {
        if (seen.has(entry.id)) throw new Error(`Market ${entry.id} is configured twice`);
        seen.add(entry.id);
        markets.push(Object.freeze({ ...mergeSettings(base, entry), id: entry.id }));
    }

    if (markets.length === 0) {
        throw new Error("No markets configured: add them to the config file or pass --markets=");
    }

    return {
        markets: Object.freeze(markets),
        maxBackoffMs: file.maxBackoffMs,
        alertAfterFailures: file.alertAfterFailures,
        statusReport: file.statusReport
    };
}

export function loadMakerConfig(filePath: string, marketIds?: readonly string[]): MakerConfig {
    let raw: unknown = {};
    if (fs.existsSync(filePath)) {
        raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } else if (!marketIds || marketIds.length === 0) {
        throw new Error(`Config file ${filePath} not found`);
    }
    return resolveMakerConfig(raw, marketIds);
}

function mergeSettings(base: MarketSettings, overrides: Partial<MarketSettings>): MarketSettings {
    return {
        minProtectionAmount: overrides.minProtectionAmount ?? base.minProtectionAmount,
        firstOrderMaxRank: overrides.firstOrderMaxRank ?? base.firstOrderMaxRank,
        orderSizeUsd: overrides.orderSizeUsd ?? base.orderSizeUsd,
        pollIntervalMs: overrides.pollIntervalMs ?? base.pollIntervalMs,
        requestTimeoutMs: overrides.requestTimeoutMs ?? base.requestTimeoutMs,
        resumeAfterFill: overrides.resumeAfterFill ?? base.resumeAfterFill,
        fillEpsilon: overrides.fillEpsilon ?? base.fillEpsilon
    };
}
