/**
 * Request Deadline
 *
 * An AbortSignal that fires on timeout or when a parent signal fires,
 * whichever comes first.
 */

export class RequestDeadline {
    private controller = new AbortController();
    private timer: ReturnType<typeof setTimeout>;
    private expired = false;

    constructor(
        readonly timeoutMs: number,
        private parent?: AbortSignal
    ) {
        this.timer = setTimeout(() => {
            this.expired = true;
            this.controller.abort('timeout');
        }, timeoutMs);

        if (parent?.aborted) {
            this.onParentAbort();
        } else {
            parent?.addEventListener('abort', this.onParentAbort, { once: true });
        }
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    /** True when the deadline itself (not the parent) aborted the request */
    get timedOut(): boolean {
        return this.expired;
    }

    /** True when the caller's signal aborted the request */
    get cancelled(): boolean {
        return this.parent?.aborted ?? false;
    }

    /**
     * Stop the timer and detach from the parent
     */
    dispose(): void {
        clearTimeout(this.timer);
        this.parent?.removeEventListener('abort', this.onParentAbort);
    }

    private onParentAbort = (): void => {
        clearTimeout(this.timer);
        if (!this.controller.signal.aborted) {
            this.controller.abort('cancelled');
        }
    };
}
