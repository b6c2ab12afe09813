export type Severity = "ERROR" | "WARN" | "INFO" | "DEBUG";

const severityRank: Record<Severity, number> = {
    ERROR: 0,
    WARN: 1,
    INFO: 2,
    DEBUG: 3,
};

// Folded stacks go to stdout, so everything logged here lands on stderr.
class OutputLogger {
    private output: NodeJS.WritableStream = process.stderr;
    private threshold: Severity = "WARN";

    setOutput(output: NodeJS.WritableStream) {
        this.output = output;
    }

    setThreshold(threshold: Severity) {
        this.threshold = threshold;
    }

    private getFormattedTime() {
        let time = new Date();
        return `${time.getFullYear()}-${time.getMonth()+1}-${time.getDate()} ${time.getHours()}:${time.getMinutes()}`;
    }

    private formatSingleMessage(message: unknown): string {
        if (typeof(message) === "undefined") {
            return "undefined";
        }
        else if (message === null) {
            return "null";
        }
        else if (message instanceof Error) {
            return message.message;
        }
        else if (typeof message === "object") {
            return JSON.stringify(message, (_key, value) => typeof value === "bigint" ? value.toString() : value, 4);
        }
        else {
            return String(message);
        }
    }

    private write(severity: Severity, data: unknown[]) {
        if (severityRank[severity] > severityRank[this.threshold]) {
            return;
        }

        let message = data.map((m) => this.formatSingleMessage(m)).join(' ');
        this.output.write(`[${this.getFormattedTime()}] [${severity}] ${message}\n`);
    }

    log(...data: unknown[]): void {
        this.info(...data);
    }

    debug(...data: unknown[]): void {
        this.write("DEBUG", data);
    }
    info(...data: unknown[]): void {
        this.write("INFO", data);
    }
    warn(...data: unknown[]): void {
        this.write("WARN", data);
    }
    error(...data: unknown[]): void {
        this.write("ERROR", data);
    }
}

export const logger = new OutputLogger();
