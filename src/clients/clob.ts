import { ClobClient } from "@polymarket/clob-client";
import type { ApiKeyCreds } from "@polymarket/clob-client";
import { providers, Wallet } from "ethers";

import { describeError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { CLOB_HOST } from "./config.js";
import type { TradingCredentials } from "./config.js";

// SignatureType.POLY_GNOSIS_SAFE
const GNOSIS_SAFE_SIGNATURE = 2;

/** The L1 (wallet-signed) key calls of the CLOB client. */
export interface ApiKeySource {
    deriveApiKey(): Promise<ApiKeyCreds>;
    createApiKey(): Promise<ApiKeyCreds>;
}

/** A wallet that never traded has no key to derive yet. */
export async function resolveApiCreds(source: ApiKeySource, log: Logger): Promise<ApiKeyCreds> {
    try {
        return await source.deriveApiKey();
    } catch (err) {
        log.warn({ err: describeError(err) }, "No API key to derive, creating one");
        return source.createApiKey();
    }
}

/**
 * Authenticated client for the trading wallet. Orders are signed by the key
 * and funded by the proxy (Gnosis Safe) when one is configured.
 */
export async function createClobClient(
    credentials: TradingCredentials,
    logger: Logger
): Promise<{ client: ClobClient; address: string }> {
    const signer = new Wallet(credentials.privateKey, new providers.JsonRpcProvider(credentials.rpcUrl));
    const log = logger.child({ component: "clob" });

    const creds = await resolveApiCreds(new ClobClient(CLOB_HOST, credentials.chainId, signer), log);
    const funder = credentials.proxyAddress;
    const client = new ClobClient(
        CLOB_HOST,
        credentials.chainId,
        signer,
        creds,
        funder ? GNOSIS_SAFE_SIGNATURE : undefined,
        funder
    );

    const address = funder ?? signer.address;
    log.info({ signer: signer.address, funder: address }, "CLOB client ready");
    return { client, address };
}
