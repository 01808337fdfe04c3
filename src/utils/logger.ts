export interface TimingResult {
    label: string;
    durationMs: number;
}

type Level = "INFO" | "ERROR" | "DEBUG";

class Logger {
    private static instance: Logger;
    private timings: TimingResult[] = [];
    private timingEnabled: boolean = false;
    private debugEnabled: boolean = false;
    private quiet: boolean = false;

    private constructor() {
        // Private constructor to prevent direct instantiation
    }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    private format(level: Level, message: string): string {
        return `[${new Date().toISOString()}] [${level}] ${message}`;
    }

    /**
     * Silence info lines, e.g. when stdout carries JSON or an MCP transport
     */
    public setQuiet(quiet: boolean): void {
        this.quiet = quiet;
    }

    public setDebugEnabled(enabled: boolean): void {
        this.debugEnabled = enabled;
    }

    public log(message: string): void {
        if (!this.quiet) {
            console.log(this.format("INFO", message));
        }
    }

    public error(message: string): void {
        console.error(this.format("ERROR", message));
    }

    public debug(message: string): void {
        if (this.debugEnabled) {
            console.error(this.format("DEBUG", message));
        }
    }

    /**
     * Enable or disable stage timing; enabling starts a fresh record
     */
    public setTimingEnabled(enabled: boolean): void {
        this.timingEnabled = enabled;
        if (enabled) {
            this.timings = [];
        }
    }

    /**
     * Run a stage, recording its duration when timing is on
     */
    public time<T>(label: string, fn: () => T): T {
        if (!this.timingEnabled) {
            return fn();
        }
        const start = performance.now();
        const result = fn();
        this.timings.push({ label, durationMs: performance.now() - start });
        return result;
    }

    public getTimings(): TimingResult[] {
        return [...this.timings];
    }

    /**
     * Drop the stages of a previous run
     */
    public clearTimings(): void {
        this.timings = [];
    }

    /**
     * Print timing summary to stderr
     */
    public printTimings(): void {
        if (this.timings.length === 0) {
            console.error("[TIMING] No timings recorded");
            return;
        }

        const total = this.timings.reduce((sum, t) => sum + t.durationMs, 0);
        console.error("\n[TIMING] === Stage Summary ===");
        for (const { label, durationMs } of this.timings) {
            const share = total > 0 ? ((durationMs / total) * 100).toFixed(1) : "0.0";
            console.error(`[TIMING] ${label.padEnd(24)} ${durationMs.toFixed(2).padStart(8)}ms ${share.padStart(5)}%`);
        }
        console.error(`[TIMING] ${"TOTAL".padEnd(24)} ${total.toFixed(2).padStart(8)}ms`);
    }
}

export default Logger;
