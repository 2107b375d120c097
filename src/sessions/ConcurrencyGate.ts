import { GatewayError, InvocationAbortedError } from '../errors/GatewayError.js';

interface Waiter {
    grant: (release: () => void) => void;
    reject: (error: Error) => void;
}

/**
 * Bounds the number of invocations in flight against one backend. A caller
 * that finds every slot taken waits up to `queueTimeoutMs` for one to free up
 * and then fails with BackendOverloaded; nothing queues indefinitely.
 */
export class ConcurrencyGate {
    private active = 0;
    private readonly waiters: Waiter[] = [];

    constructor(
        private limit: number,
        private queueTimeoutMs: number,
        private readonly backendId: string,
    ) { }

    public get inFlight(): number {
        return this.active;
    }

    public get waiting(): number {
        return this.waiters.length;
    }

    /**
     * Applies new bounds. Raising the limit admits waiters right away; lowering
     * it takes effect as in-flight calls finish.
     */
    public reconfigure(limit: number, queueTimeoutMs: number): void {
        this.limit = limit;
        this.queueTimeoutMs = queueTimeoutMs;
        while (this.active < this.limit && this.waiters.length > 0) {
            this.active++;
            const waiter = this.waiters.shift();
            waiter?.grant(this.createRelease());
        }
    }

    /**
     * Resolves with a release function once a slot is held. The release function
     * is idempotent.
     * @throws GatewayError BackendOverloaded when no slot frees up in time.
     * @throws InvocationAbortedError when the signal fires while waiting.
     */
    public acquire(operationName: string, signal?: AbortSignal): Promise<() => void> {
        if (signal?.aborted) {
            return Promise.reject(new InvocationAbortedError());
        }
        if (this.active < this.limit) {
            this.active++;
            return Promise.resolve(this.createRelease());
        }
        const overloaded = () => new GatewayError(
            'BackendOverloaded',
            `Concurrency limit of ${this.limit} reached; retry later.`,
            { backendId: this.backendId, operation: operationName },
        );
        if (this.queueTimeoutMs <= 0) {
            return Promise.reject(overloaded());
        }

        return new Promise((resolve, reject) => {
            const settle = () => {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onAbort);
                const index = this.waiters.indexOf(waiter);
                if (index >= 0) this.waiters.splice(index, 1);
            };
            const waiter: Waiter = {
                grant: release => {
                    settle();
                    resolve(release);
                },
                reject: error => {
                    settle();
                    reject(error);
                },
            };
            const onAbort = () => waiter.reject(new InvocationAbortedError());
            const timer = setTimeout(() => waiter.reject(overloaded()), this.queueTimeoutMs);
            signal?.addEventListener('abort', onAbort, { once: true });
            this.waiters.push(waiter);
        });
    }

    private createRelease(): () => void {
        let released = false;
        return () => {
            if (released) return;
            released = true;
            const next = this.active <= this.limit ? this.waiters.shift() : undefined;
            if (next) {
                // The slot passes straight to the next waiter.
                next.grant(this.createRelease());
            } else {
                this.active--;
            }
        };
    }
}
