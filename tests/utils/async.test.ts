import { BackendTimeoutError } from '../../src/errors/GatewayError';
import { linkedAbort, raceAbort, withTimeout } from '../../src/utils/async';

describe('withTimeout', () => {
    it('passes through a result that arrives in time', async () => {
        await expect(withTimeout(Promise.resolve(7), 100, 'Lookup')).resolves.toBe(7);
    });

    it('rejects with a named timeout when the work is too slow', async () => {
        const never = new Promise<number>(() => undefined);
        await expect(withTimeout(never, 10, 'Lookup')).rejects.toThrow(new BackendTimeoutError('Lookup timed out after 10ms'));
    });

    it('waits out a timeout longer than a timer can hold', async () => {
        const later = new Promise<string>(resolve => setTimeout(() => resolve('late'), 20));
        await expect(withTimeout(later, 3_000_000_000, 'Lookup')).resolves.toBe('late');
    });
});

describe('linkedAbort', () => {
    it('fires on the deadline and remembers why', async () => {
        const guard = linkedAbort(new AbortController().signal, 10);
        await new Promise(resolve => setTimeout(resolve, 30));

        expect(guard.signal.aborted).toBe(true);
        expect(guard.timedOut()).toBe(true);
        expect(guard.signal.reason).toBeInstanceOf(BackendTimeoutError);
    });

    it('does not fire early for a deadline longer than a timer can hold', async () => {
        const guard = linkedAbort(new AbortController().signal, 3_000_000_000);
        await new Promise(resolve => setTimeout(resolve, 20));

        expect(guard.signal.aborted).toBe(false);
        guard.dispose();
    });

    it('follows the parent signal', () => {
        const parent = new AbortController();
        const guard = linkedAbort(parent.signal, 1000);

        parent.abort('gone');

        expect(guard.signal.aborted).toBe(true);
        expect(guard.timedOut()).toBe(false);
        expect(guard.signal.reason).toBe('gone');
        guard.dispose();
    });

    it('does not fire after dispose', async () => {
        const guard = linkedAbort(new AbortController().signal, 10);
        guard.dispose();
        await new Promise(resolve => setTimeout(resolve, 30));

        expect(guard.signal.aborted).toBe(false);
    });
});

describe('raceAbort', () => {
    it('rejects with the abort reason when the signal fires first', async () => {
        const controller = new AbortController();
        const racing = raceAbort(new Promise<number>(() => undefined), controller.signal);

        controller.abort('cancelled');

        await expect(racing).rejects.toBe('cancelled');
    });

    it('resolves with the work when it finishes first', async () => {
        await expect(raceAbort(Promise.resolve('done'), new AbortController().signal)).resolves.toBe('done');
    });
});
