import { z } from "zod";

import { MarketNotFoundError, NetworkError, toMakerError } from "../lib/errors.js";
import { GAMMA_API_URL } from "./config.js";

const TokenIdsSchema = z.union([
    z.array(z.string()),
    // Gamma ships clobTokenIds as a JSON-encoded string
    z.string().transform((raw, ctx) => {
        try {
            return z.array(z.string()).parse(JSON.parse(raw));
        } catch {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `clobTokenIds is not a JSON array: ${raw}` });
            return z.NEVER;
        }
    })
]);

const GammaMarketSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    question: z.string(),
    slug: z.string().optional(),
    conditionId: z.string().optional(),
    active: z.boolean().optional(),
    closed: z.boolean().optional(),
    clobTokenIds: TokenIdsSchema.optional(),
    orderPriceMinTickSize: z.coerce.number().positive().optional(),
    negRisk: z.boolean().optional()
});

export type GammaMarket = z.infer<typeof GammaMarketSchema>;

export interface ResolvedMarket {
    id: string;
    title: string;
    slug?: string;
    yesTokenId: string;
    tickSize?: number;
    negRisk: boolean;
    closed: boolean;
}

export class GammaClient {
    private readonly baseUrl: string;
    private readonly fetchFn: typeof fetch;

    constructor(baseUrl: string = GAMMA_API_URL, fetchFn: typeof fetch = fetch) {
        this.baseUrl = baseUrl;
        this.fetchFn = fetchFn;
    }

    /**
     * Looks a market up by numeric id (`/markets/{id}`) or by slug (`/markets?slug=`).
     */
    async getMarket(ref: string): Promise<ResolvedMarket> {
        const numeric = /^\d+$/.test(ref);
        const url = numeric
            ? `${this.baseUrl}/markets/${ref}`
            : `${this.baseUrl}/markets?slug=${encodeURIComponent(ref)}`;

        const body = await this.getJson(url, ref);
        const candidate: unknown = Array.isArray(body) ? body[0] : body;
        if (candidate === undefined) throw new MarketNotFoundError(ref);

        const parsed = GammaMarketSchema.safeParse(candidate);
        if (!parsed.success) {
            throw new NetworkError(`Unexpected Gamma payload for ${ref}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        }
        return toResolvedMarket(ref, parsed.data);
    }

    private async getJson(url: string, ref: string): Promise<unknown> {
        let response: Response;
        try {
            response = await this.fetchFn(url);
        } catch (err) {
            throw new NetworkError(`Gamma request failed: ${url}`, err);
        }
        if (response.status === 404) throw new MarketNotFoundError(ref);
        if (!response.ok) {
            throw toMakerError(new Error(`Gamma API Error: ${response.status} ${response.statusText}`), {
                marketId: ref,
                status: response.status
            });
        }
        return response.json();
    }
}

function toResolvedMarket(ref: string, market: GammaMarket): ResolvedMarket {
    // outcome order is [Yes, No]
    const yesTokenId = market.clobTokenIds?.[0];
    if (!yesTokenId) throw new MarketNotFoundError(ref, "market has no CLOB tokens");
    return {
        id: market.id,
        title: market.question,
        slug: market.slug,
        yesTokenId,
        tickSize: market.orderPriceMinTickSize,
        negRisk: market.negRisk ?? false,
        closed: market.closed ?? false
    };
}
