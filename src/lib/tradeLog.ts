import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

export const TradeRecordSchema = z.object({
    timestamp: z.string(),
    marketId: z.string(),
    title: z.string().optional(),
    orderId: z.string(),
    price: z.number(),
    filledAmount: z.number(),
    filledUsd: z.number(),
    verdict: z.enum(["PARTIAL_FILL", "FULL_FILL"]),
    rawStatus: z.string()
});

export type TradeRecord = z.infer<typeof TradeRecordSchema>;

/**
 * Append-only JSONL log of detected fills, shared by every market worker.
 * Writes are chained so concurrent appends never interleave.
 */
export class TradeLog {
    private readonly filePath: string;
    private tail: Promise<void> = Promise.resolve();

    constructor(filePath: string = path.resolve(process.env.DATA_DIR ?? "data", "trades.jsonl")) {
        this.filePath = filePath;
    }

    get path(): string {
        return this.filePath;
    }

    append(record: TradeRecord): Promise<void> {
        const line = JSON.stringify(TradeRecordSchema.parse(record)) + "\n";
        const write = this.tail.then(async () => {
            await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
            await fs.promises.appendFile(this.filePath, line, "utf-8");
        });
        // keep the chain alive after a failed write; the caller still sees the rejection
        this.tail = write.catch(() => undefined);
        return write;
    }

    /** Reads every well-formed record; unparsable lines are skipped. */
    async readAll(): Promise<TradeRecord[]> {
        let content: string;
        try {
            content = await fs.promises.readFile(this.filePath, "utf-8");
        } catch (err) {
            if (isMissingFile(err)) return [];
            throw err;
        }

        const records: TradeRecord[] = [];
        for (const line of content.split("\n")) {
            if (!line.trim()) continue;
            let json: unknown;
            try {
                json = JSON.parse(line);
            } catch {
                continue;
            }
            const parsed = TradeRecordSchema.safeParse(json);
            if (parsed.success) records.push(parsed.data);
        }
        return records;
    }

    async countSince(since: Date): Promise<number> {
        const records = await this.readAll();
        return records.filter(r => Date.parse(r.timestamp) >= since.getTime()).length;
    }
}

function isMissingFile(err: unknown): boolean {
    return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
