import { TypedEventEmitter } from "@/utils/TypedEventEmitter";

interface ControlSignalEventMap {
    pause: () => void;
    resume: () => void;
    stop: () => void;
}

/**
 * Pause and stop flags shared by every worker of one download. Workers read
 * them between reads; `stop()` also aborts in-flight requests through `signal`.
 *
 * Stopping is one-way. Once stopped, `pause()` and `resume()` do nothing and a
 * new download needs a new instance.
 */
export class ControlSignal extends TypedEventEmitter<ControlSignalEventMap> {
    private paused = false;
    private stopped = false;
    private readonly abortController = new AbortController();

    get isPaused(): boolean {
        return this.paused;
    }

    get isStopped(): boolean {
        return this.stopped;
    }

    get signal(): AbortSignal {
        return this.abortController.signal;
    }

    /** @returns whether the flag changed */
    pause(): boolean {
        if (this.stopped || this.paused) return false;
        this.paused = true;
        this.emit("pause");
        return true;
    }

    resume(): boolean {
        if (this.stopped || !this.paused) return false;
        this.paused = false;
        this.emit("resume");
        return true;
    }

    stop(): boolean {
        if (this.stopped) return false;
        this.stopped = true;
        this.abortController.abort();
        this.emit("stop");
        return true;
    }

    /**
     * Resolves once the signal is neither paused nor stopped-while-paused,
     * i.e. on the next `resume()` or `stop()`.
     */
    waitWhilePaused(): Promise<void> {
        if (!this.paused || this.stopped) return Promise.resolve();

        return new Promise<void>(resolve => {
            const release = () => {
                this.off("resume", release);
                this.off("stop", release);
                resolve();
            };
            this.on("resume", release);
            this.on("stop", release);
        });
    }
}
