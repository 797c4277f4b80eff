export interface DebugSnapshot {
    stage: string;
    output: string;
    logs: string[];
}

/**
 * Per-conversion debug trail. Disabled logs are dropped on the floor, so
 * callers can log unconditionally.
 */
export class DebugLog {
    private readonly enabled: boolean;
    private pending: string[] = [];
    private allLogs: string[] = [];
    private snapshots: DebugSnapshot[] = [];

    constructor(enabled = false) {
        this.enabled = enabled;
    }

    public log(message: string): void {
        if (!this.enabled) return;
        this.pending.push(message);
        this.allLogs.push(message);
    }

    /**
     * Records the output of a pipeline stage together with the messages
     * logged since the previous snapshot.
     */
    public captureSnapshot(stage: string, output: string): void {
        if (!this.enabled) return;
        this.snapshots.push({ stage, output, logs: [...this.pending] });
        this.pending = [];
    }

    public getLogs(): string[] {
        return [...this.allLogs];
    }

    public getSnapshots(): DebugSnapshot[] {
        return [...this.snapshots];
    }

    public reset(): void {
        this.pending = [];
        this.allLogs = [];
        this.snapshots = [];
    }
}
