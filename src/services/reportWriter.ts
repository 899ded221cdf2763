// src/services/reportWriter.ts
import * as fs from "fs/promises";
import * as path from "path";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { ReportSink, SessionReport } from "../types/sessionTypes.js";

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

/**
 * `contact_report_<yyyyMMdd_HHmmss>_<sessionId>.json`, in local time. The
 * session id keeps reports finished within the same second apart.
 */
export function reportFileName(date: Date, sessionId: string): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `contact_report_${day}_${time}_${sessionId}.json`;
}

/**
 * Writes each report as pretty-printed JSON into a directory, creating it on
 * first use.
 */
export class JsonReportWriter implements ReportSink {
    public readonly name = "json";
    private readonly directory: string;
    private lastPath: string | null = null;

    constructor(
        directory: string,
        private readonly logger: ILogger,
        private readonly clock: () => Date = () => new Date()
    ) {
        this.directory = path.resolve(directory);
    }

    public async write(report: SessionReport): Promise<void> {
        await fs.mkdir(this.directory, { recursive: true });

        const file = path.join(
            this.directory,
            reportFileName(this.clock(), report.sessionId)
        );
        await fs.writeFile(file, `${JSON.stringify(report, null, 2)}\n`, "utf8");
        this.lastPath = file;

        this.logger.info("Contact report saved", {
            component: "JsonReportWriter",
            file,
            collisions: report.collisionCount,
        });
    }

    /** Path of the most recent report, or null before the first write */
    public getLastPath(): string | null {
        return this.lastPath;
    }
}
