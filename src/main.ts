import path from "node:path";

import { Bot } from "./bot.js";
import { createClobClient } from "./clients/clob.js";
import { loadEnvConfig, requireCredentials } from "./clients/config.js";
import type { EnvConfig } from "./clients/config.js";
import { ClobExchange } from "./clients/exchange.js";
import { GammaClient } from "./clients/gamma-api.js";
import { SimulatedExchange } from "./clients/simulated.js";
import { LogAlertChannel, TelegramAlertChannel } from "./clients/telegram.js";
import type { AlertChannel, MarketDataSource, MarketResolver, OrderExecutionClient } from "./clients/types.js";
import { parseCliArgs } from "./config/args.js";
import { loadMakerConfig } from "./config/makerConfig.js";
import { createLogger } from "./lib/logger.js";
import type { Logger } from "./lib/logger.js";
import { TradeLog } from "./lib/tradeLog.js";
import { SafeDepthStrategy } from "./strategies/SafeDepthStrategy.js";

type Venue = MarketResolver & MarketDataSource & OrderExecutionClient;

async function connectVenue(sim: boolean, env: EnvConfig, logger: Logger): Promise<{ venue: Venue; address?: string }> {
    if (sim) {
        logger.warn("SIMULATION MODE: orders go to an in-process book, nothing reaches the exchange");
        return { venue: new SimulatedExchange({ volatility: 0.2, fillProbability: 0.002 }) };
    }
    const { client, address } = await createClobClient(requireCredentials(env), logger);
    return { venue: new ClobExchange(client, new GammaClient(), logger), address };
}

function createAlerts(env: EnvConfig, logger: Logger, address?: string): AlertChannel {
    if (env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID) {
        return new TelegramAlertChannel({
            botToken: env.TELEGRAM_BOT_TOKEN,
            chatId: env.TELEGRAM_CHAT_ID,
            walletAlias: env.WALLET_ALIAS,
            walletAddress: address
        });
    }
    logger.warn("Telegram not configured, alerts go to the log only");
    return new LogAlertChannel(logger);
}

async function main(): Promise<number> {
    const args = parseCliArgs();
    const env = loadEnvConfig(args.envPath);
    const logger = createLogger({ level: args.verbose ? "debug" : undefined });

    const config = loadMakerConfig(args.configPath, args.markets);
    logger.info({ markets: config.markets.map(m => m.id), sim: args.sim }, "Starting safe-depth maker");

    const { venue, address } = await connectVenue(args.sim, env, logger);
    const strategy = new SafeDepthStrategy({
        config,
        resolver: venue,
        marketData: venue,
        execution: venue,
        alerts: createAlerts(env, logger, address),
        tradeLog: new TradeLog(path.resolve(env.DATA_DIR, args.sim ? "trades.sim.jsonl" : "trades.jsonl")),
        logger,
        statusReport: args.statusReport
    });

    return new Bot(strategy, logger).start();
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch(err => {
        console.error(err);
        process.exitCode = 1;
    });
