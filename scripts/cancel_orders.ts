import { loadEnvConfig, requireCredentials } from "../src/clients/config.js";
import { createClobClient } from "../src/clients/clob.js";
import { ClobExchange } from "../src/clients/exchange.js";
import { GammaClient } from "../src/clients/gamma-api.js";
import { createLogger } from "../src/lib/logger.js";

// Emergency cancel: every open order of the wallet, or only those of --markets=
async function main() {
    const argv = process.argv.slice(2);
    const markets = (argv.find(a => a.startsWith("--markets="))?.split("=")[1] ?? "")
        .split(",")
        .map(m => m.trim())
        .filter(Boolean);

    const logger = createLogger();
    const env = loadEnvConfig(argv.find(a => a.startsWith("--env="))?.split("=")[1]);
    const { client } = await createClobClient(requireCredentials(env), logger);

    if (markets.length === 0) {
        const result: unknown = await client.cancelAll();
        logger.info({ result }, "Canceled all open orders");
        return;
    }

    const exchange = new ClobExchange(client, new GammaClient(), logger);
    for (const ref of markets) {
        const market = await exchange.resolveMarket(ref);
        const result: unknown = await client.cancelMarketOrders({ asset_id: market.tokenId });
        logger.info({ market: ref, result }, `Canceled open orders on "${market.title}"`);
    }
}

main().catch(err => {
    console.error(err);
    process.exitCode = 1;
});
