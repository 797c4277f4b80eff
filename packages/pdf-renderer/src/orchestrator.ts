import { DebugLog } from "markdown-renderer";
import type { AssembledDocument } from "./assemble";
import { DEFAULT_TIMEOUT_MS } from "./config";
import { CapabilityUnavailableError, RenderAbortedError, RenderError, TimeoutError, errorMessage } from "./errors";

export type PdfArtifact = Uint8Array;

/**
 * An acquired renderer: a browser tab, a remote connection, a test fake.
 * Owned by exactly one render from launch until close.
 */
export interface RendererSession {
    /** Resolves once the renderer signals that content and styles have loaded. */
    loadHtml(html: string): Promise<void>;
    printToPdf(marginPixels: number): Promise<PdfArtifact>;
    close(): Promise<void>;
}

export interface RendererCapability {
    readonly name: string;
    launch(): Promise<RendererSession>;
}

export type RenderState = "idle" | "launching" | "loaded" | "printed" | "closed" | "failed";

export interface OrchestratorOptions {
    // bounds launching through printing; release runs regardless
    timeoutMs?: number;
    signal?: AbortSignal;
    debug?: DebugLog;
    onStateChange?: (state: RenderState) => void;
}

/**
 * Rejects every pending race once the time runs out or the caller aborts.
 */
class Deadline {
    private expiredWith: Error | null = null;
    private readonly listeners = new Set<(error: Error) => void>();
    private readonly timer: ReturnType<typeof setTimeout>;
    private readonly signal?: AbortSignal;
    private readonly onAbort = () => this.expire(new RenderAbortedError(this.signal?.reason));

    constructor(timeoutMs: number, onTimeout: () => Error, signal?: AbortSignal) {
        this.timer = setTimeout(() => this.expire(onTimeout()), timeoutMs);
        this.signal = signal;
        if (signal?.aborted) {
            this.onAbort();
        } else {
            signal?.addEventListener("abort", this.onAbort, { once: true });
        }
    }

    /**
     * Settles with `work` unless the deadline passes first. Rejections of
     * `work` are mapped through `wrap`; results that arrive too late are handed
     * to `onLate` so nothing acquired is leaked.
     */
    public race<T>(work: Promise<T>, wrap: (error: unknown) => Error, onLate: (value: T) => void): Promise<T> {
        return new Promise<T>((resolve, reject) => {
            let settled = false;
            const onExpire = (error: Error) => {
                if (settled) return;
                settled = true;
                reject(error);
            };

            if (this.expiredWith) {
                onExpire(this.expiredWith);
            } else {
                this.listeners.add(onExpire);
            }

            work.then(
                (value) => {
                    this.listeners.delete(onExpire);
                    if (settled) {
                        onLate(value);
                        return;
                    }
                    settled = true;
                    resolve(value);
                },
                (error: unknown) => {
                    this.listeners.delete(onExpire);
                    if (settled) return;
                    settled = true;
                    reject(wrap(error));
                }
            );
        });
    }

    public clear(): void {
        clearTimeout(this.timer);
        this.signal?.removeEventListener("abort", this.onAbort);
    }

    private expire(error: Error): void {
        if (this.expiredWith) return;
        this.expiredWith = error;
        for (const listener of this.listeners) listener(error);
        this.listeners.clear();
    }
}

/**
 * Drives one render: idle -> launching -> loaded -> printed -> closed, or
 * failed from any step. The session is closed on every path before the
 * result or the error is returned.
 */
export class RenderOrchestrator {
    private state: RenderState = "idle";
    // finer grained than state, for timeout messages
    private step = "idle";
    private readonly history: RenderState[] = ["idle"];
    private readonly timeoutMs: number;
    private readonly debug: DebugLog;

    constructor(
        private readonly capability: RendererCapability,
        private readonly options: OrchestratorOptions = {}
    ) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.debug = options.debug ?? new DebugLog(false);
    }

    public get currentState(): RenderState {
        return this.state;
    }

    public get stateHistory(): RenderState[] {
        return [...this.history];
    }

    public async renderToPdf(doc: AssembledDocument): Promise<PdfArtifact> {
        if (this.state !== "idle") {
            throw new RenderError(`this orchestrator has already rendered (state: ${this.state})`);
        }

        const name = this.capability.name;
        const deadline = new Deadline(
            this.timeoutMs,
            () => new TimeoutError(this.timeoutMs, this.step),
            this.options.signal
        );
        let session: RendererSession | null = null;

        try {
            this.transition("launching");
            this.step = "launching";
            session = await deadline.race(
                this.launch(),
                (error) =>
                    error instanceof CapabilityUnavailableError
                        ? error
                        : new CapabilityUnavailableError(`could not launch ${name}: ${errorMessage(error)}`, {
                              cause: error,
                          }),
                (late) => this.releaseLate(late)
            );

            this.step = "loading";
            await deadline.race(
                session.loadHtml(doc.html),
                (error) => new RenderError(`${name} failed to load the document: ${errorMessage(error)}`, { cause: error }),
                () => undefined
            );
            this.transition("loaded");

            this.step = "printing";
            const pdf = await deadline.race(
                session.printToPdf(doc.marginPixels),
                (error) => new RenderError(`${name} failed to print: ${errorMessage(error)}`, { cause: error }),
                () => undefined
            );
            this.transition("printed");
            deadline.clear();

            const acquired = session;
            session = null;
            await this.release(acquired);
            this.transition("closed");
            return pdf;
        } catch (error) {
            deadline.clear();
            if (session) await this.releaseAfterFailure(session, error);
            this.transition("failed");
            throw error;
        }
    }

    // launch() may throw synchronously in a hand-written capability
    private async launch(): Promise<RendererSession> {
        return this.capability.launch();
    }

    private async release(session: RendererSession): Promise<void> {
        try {
            await session.close();
            this.debug.log(`orchestrator: released ${this.capability.name}`);
        } catch (error) {
            throw new RenderError(`could not close ${this.capability.name}: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async releaseAfterFailure(session: RendererSession, original: unknown): Promise<void> {
        try {
            await session.close();
            this.debug.log(`orchestrator: released ${this.capability.name} after: ${errorMessage(original)}`);
        } catch (closeError) {
            this.debug.log(
                `orchestrator: closing ${this.capability.name} failed (${errorMessage(closeError)}) after: ${errorMessage(original)}`
            );
        }
    }

    // a session that shows up after the deadline still has to be closed
    private releaseLate(session: RendererSession): void {
        this.debug.log(`orchestrator: ${this.capability.name} launched after the deadline, closing it`);
        void session.close().then(
            () => this.debug.log(`orchestrator: released late ${this.capability.name}`),
            (error: unknown) => this.debug.log(`orchestrator: closing late ${this.capability.name} failed: ${errorMessage(error)}`)
        );
    }

    private transition(next: RenderState): void {
        this.debug.log(`orchestrator: ${this.state} -> ${next}`);
        this.state = next;
        this.history.push(next);
        this.options.onStateChange?.(next);
    }
}
