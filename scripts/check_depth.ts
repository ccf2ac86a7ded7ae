import { ClobClient } from "@polymarket/clob-client";

import { CLOB_HOST, loadEnvConfig } from "../src/clients/config.js";
import { ClobExchange } from "../src/clients/exchange.js";
import { GammaClient } from "../src/clients/gamma-api.js";
import { loadMakerConfig } from "../src/config/makerConfig.js";
import { createSilentLogger } from "../src/lib/logger.js";
import { describeDepth } from "../src/lib/orderbook.js";
import { computeSafePrice } from "../src/lib/safePrice.js";

// Read-only: prints the bid ladder and where a new order would go.
// Usage: tsx scripts/check_depth.ts --markets=<id|slug>[,...] [--config=config/maker.json]
async function main() {
    const argv = process.argv.slice(2);
    const arg = (name: string) => argv.find(a => a.startsWith(`--${name}=`))?.split("=")[1];
    const marketIds = (arg("markets") ?? "").split(",").map(m => m.trim()).filter(Boolean);

    const env = loadEnvConfig(arg("env"));
    const config = loadMakerConfig(arg("config") ?? "config/maker.json", marketIds);
    const exchange = new ClobExchange(new ClobClient(CLOB_HOST, env.CHAIN_ID), new GammaClient(), createSilentLogger());

    for (const market of config.markets) {
        const info = await exchange.resolveMarket(market.id);
        const book = await exchange.fetchOrderBook(info.marketId, "BID");
        const target = computeSafePrice(book, market.minProtectionAmount, market.firstOrderMaxRank);
        const unbounded = computeSafePrice(book, market.minProtectionAmount, null);

        console.log(`\n====== ${info.title} ======`);
        console.log(`Token:      ${info.tokenId}`);
        console.log(`Tick:       ${info.tickSize}`);
        console.log(`Protection: $${market.minProtectionAmount} within bid${market.firstOrderMaxRank}`);
        for (const line of describeDepth(book)) console.log(`  ${line}`);
        if (target) {
            console.log(`Would place @ ${target.price} (bid${target.rank}, $${target.protection.toFixed(0)} ahead)`);
        } else if (unbounded) {
            console.log(`Nothing within bid${market.firstOrderMaxRank}; deepest fallback @ ${unbounded.price} (bid${unbounded.rank})`);
        } else {
            console.log("Book is too thin for the configured protection");
        }
    }
}

main().catch(err => {
    console.error(err);
    process.exitCode = 1;
});
