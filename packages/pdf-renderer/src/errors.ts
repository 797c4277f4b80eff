export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * The configuration handed to the pipeline failed validation.
 */
export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`invalid render configuration: ${issues.join("; ")}`);
        this.name = "ConfigError";
        this.issues = issues;
    }
}

/**
 * No renderer could be acquired, e.g. no Chrome or Chromium is installed.
 * Never retried: the environment is missing a dependency.
 */
export class CapabilityUnavailableError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "CapabilityUnavailableError";
    }
}

/**
 * The renderer reported a failure while loading or printing.
 */
export class RenderError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "RenderError";
    }
}

export class TimeoutError extends Error {
    readonly timeoutMs: number;
    // state the render was in when the deadline passed
    readonly state: string;

    constructor(timeoutMs: number, state: string) {
        super(`rendering did not finish within ${timeoutMs}ms (stopped while ${state})`);
        this.name = "TimeoutError";
        this.timeoutMs = timeoutMs;
        this.state = state;
    }
}

export class RenderAbortedError extends Error {
    constructor(reason?: unknown) {
        super(reason === undefined ? "rendering was aborted" : `rendering was aborted: ${errorMessage(reason)}`, {
            cause: reason,
        });
        this.name = "RenderAbortedError";
    }
}
