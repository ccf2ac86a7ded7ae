import dotenv from "dotenv";
import { z } from "zod";

export const CLOB_HOST = "https://clob.polymarket.com";
export const GAMMA_API_URL = "https://gamma-api.polymarket.com";

// `KEY=` in .env counts as unset
const blank = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);
const optionalString = z.preprocess(blank, z.string().optional());

const EnvSchema = z.object({
    PRIVATE_KEY: optionalString,
    RPC_URL: z.preprocess(blank, z.string().url().optional()),
    CHAIN_ID: z.preprocess(blank, z.coerce.number().int().positive().default(137)),
    // Optional: Proxy / Gnosis Safe the bot trades for
    POLY_PROXY_ADDRESS: optionalString,
    TELEGRAM_BOT_TOKEN: optionalString,
    TELEGRAM_CHAT_ID: optionalString,
    WALLET_ALIAS: optionalString,
    DATA_DIR: z.preprocess(blank, z.string().default("data"))
});

export type EnvConfig = z.infer<typeof EnvSchema>;

export interface TradingCredentials {
    privateKey: string;
    rpcUrl: string;
    chainId: number;
    proxyAddress?: string;
}

/** Loads `.env` (without overriding variables already set) and validates it. */
export function loadEnvConfig(envPath?: string): EnvConfig {
    dotenv.config(envPath ? { path: envPath } : undefined);
    return parseEnv(process.env);
}

export function parseEnv(source: Record<string, string | undefined>): EnvConfig {
    return EnvSchema.parse(source);
}

export function requireCredentials(env: EnvConfig): TradingCredentials {
    if (!env.PRIVATE_KEY || !env.RPC_URL) {
        throw new Error("PRIVATE_KEY and RPC_URL are required in .env (or run with --sim)");
    }
    return {
        privateKey: env.PRIVATE_KEY,
        rpcUrl: env.RPC_URL,
        chainId: env.CHAIN_ID,
        proxyAddress: env.POLY_PROXY_ADDRESS
    };
}
