import { describeError } from "./lib/errors.js";
import type { Logger } from "./lib/logger.js";
import type { Strategy } from "./strategies/types.js";

export class Bot {
    private strategy: Strategy;
    private logger: Logger;
    private stopping: Promise<void> | null = null;

    constructor(strategy: Strategy, logger: Logger) {
        this.strategy = strategy;
        this.logger = logger;
    }

    /** Runs the strategy until it ends or a signal arrives. Resolves to the process exit code. */
    async start(): Promise<number> {
        const onSignal = (signal: NodeJS.Signals) => {
            this.logger.info({ signal }, "Stopping bot...");
            this.stop().catch(err => this.logger.error({ err: describeError(err) }, "Cleanup failed"));
        };
        process.once("SIGINT", onSignal);
        process.once("SIGTERM", onSignal);

        try {
            this.logger.info({ strategy: this.strategy.name }, "Initializing strategy...");
            await this.strategy.init();

            this.logger.info("Running strategy...");
            await this.strategy.run();
            await this.stop();
            return 0;
        } catch (err) {
            this.logger.fatal({ err: describeError(err) }, "Fatal error, bot stopped");
            await this.stop().catch(cleanupErr =>
                this.logger.error({ err: describeError(cleanupErr) }, "Cleanup failed")
            );
            return 1;
        } finally {
            process.off("SIGINT", onSignal);
            process.off("SIGTERM", onSignal);
        }
    }

    stop(): Promise<void> {
        if (!this.stopping) this.stopping = this.strategy.cleanup();
        return this.stopping;
    }
}
