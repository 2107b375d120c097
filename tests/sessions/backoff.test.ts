import { computeBackoffDelay } from '../../src/sessions/backoff';

const settings = { initialDelayMs: 100, maxDelayMs: 1000, multiplier: 2, jitter: 0.5 };

describe('computeBackoffDelay', () => {
    it('grows exponentially without jitter', () => {
        const noJitter = () => 0;
        expect([0, 1, 2, 3].map(attempt => computeBackoffDelay(attempt, settings, noJitter))).toEqual([100, 200, 400, 800]);
    });

    it('is capped at the maximum delay', () => {
        expect(computeBackoffDelay(10, settings, () => 0)).toBe(1000);
    });

    it('shaves at most the jitter fraction off', () => {
        expect(computeBackoffDelay(1, settings, () => 1)).toBe(100);
        expect(computeBackoffDelay(1, settings, () => 0.5)).toBe(150);
    });
});
