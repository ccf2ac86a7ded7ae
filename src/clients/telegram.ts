import { NetworkError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { AlertChannel, AlertSeverity } from "./types.js";

const TELEGRAM_API = "https://api.telegram.org/bot";
const SEND_TIMEOUT_MS = 10_000;

export interface TelegramOptions {
    botToken: string;
    chatId: string;
    walletAlias?: string;
    walletAddress?: string;
    fetchFn?: typeof fetch;
}

export function shortenAddress(address: string): string {
    return address.length > 12 ? `${address.slice(0, 6)}...${address.slice(-4)}` : address;
}

/** HTML-formatted messages through the Bot API `sendMessage` call. */
export class TelegramAlertChannel implements AlertChannel {
    private readonly url: string;
    private readonly chatId: string;
    private readonly footer: string | null;
    private readonly fetchFn: typeof fetch;

    constructor(opts: TelegramOptions) {
        this.url = `${TELEGRAM_API}${opts.botToken}/sendMessage`;
        this.chatId = opts.chatId;
        this.fetchFn = opts.fetchFn ?? fetch;

        const wallet = opts.walletAlias || (opts.walletAddress ? shortenAddress(opts.walletAddress) : null);
        this.footer = wallet ? `👛 Wallet: <code>${wallet}</code>` : null;
    }

    async notify(_severity: AlertSeverity, message: string): Promise<void> {
        const text = this.footer ? `${message}\n${this.footer}` : message;
        const response = await this.fetchFn(this.url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body: JSON.stringify({
                chat_id: this.chatId,
                text,
                parse_mode: "HTML",
                disable_web_page_preview: true
            }),
            signal: AbortSignal.timeout(SEND_TIMEOUT_MS)
        });
        if (!response.ok) {
            throw new NetworkError(`Telegram sendMessage failed: ${response.status} ${response.statusText}`);
        }
    }
}

export function stripTags(message: string): string {
    return message
        .replace(/<[^>]+>/g, "")
        .replace(/&lt;/g, "<")
        .replace(/&gt;/g, ">")
        .replace(/&amp;/g, "&");
}

/** Writes alerts to the log when Telegram is not configured. */
export class LogAlertChannel implements AlertChannel {
    private readonly logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger.child({ component: "alerts" });
    }

    async notify(severity: AlertSeverity, message: string): Promise<void> {
        const text = stripTags(message).replace(/\n/g, " | ");
        if (severity === "CRITICAL") this.logger.error({ severity }, text);
        else if (severity === "WARNING") this.logger.warn({ severity }, text);
        else this.logger.info({ severity }, text);
    }
}
