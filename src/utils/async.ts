import { BackendTimeoutError } from '../errors/GatewayError.js';

/** Longest delay a Node timer honours; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function timerDelay(timeoutMs: number): number {
    return Math.min(MAX_TIMER_DELAY_MS, Math.max(0, timeoutMs));
}

/**
 * Rejects with BackendTimeoutError if `promise` has not settled after `timeoutMs`.
 * The underlying work is not cancelled; pair with an AbortSignal for that.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => {
            reject(new BackendTimeoutError(`${what} timed out after ${timeoutMs}ms`));
        }, timerDelay(timeoutMs));
        promise.then(
            value => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            },
        );
    });
}

/**
 * An AbortController that fires when `parent` fires or when `timeoutMs` elapses,
 * whichever comes first. `dispose` must be called once the guarded work settles.
 */
export function linkedAbort(parent: AbortSignal, timeoutMs: number): { signal: AbortSignal; timedOut: () => boolean; dispose: () => void } {
    const controller = new AbortController();
    let expired = false;
    const onParentAbort = () => controller.abort(parent.reason);
    const timer = setTimeout(() => {
        expired = true;
        controller.abort(new BackendTimeoutError(`Deadline of ${timeoutMs}ms exceeded`));
    }, timerDelay(timeoutMs));

    if (parent.aborted) {
        controller.abort(parent.reason);
    } else {
        parent.addEventListener('abort', onParentAbort, { once: true });
    }

    return {
        signal: controller.signal,
        timedOut: () => expired,
        dispose: () => {
            clearTimeout(timer);
            parent.removeEventListener('abort', onParentAbort);
        },
    };
}

/**
 * Settles with the first of `promise` or the abort of `signal`. Used so a
 * connector that ignores its signal still cannot hold a caller past its deadline.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        if (signal.aborted) {
            onAbort();
        } else {
            signal.addEventListener('abort', onAbort, { once: true });
        }
        promise.then(
            value => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });
}
