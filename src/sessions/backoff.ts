import { BackoffSettings } from '../types/configTypes.js';

/**
 * Delay before reconnection attempt `attempt` (0-based): exponential growth
 * capped at `maxDelayMs`, then scaled by a random factor in [1 - jitter, 1]
 * so that backends failing together do not retry in lockstep.
 */
export function computeBackoffDelay(attempt: number, settings: BackoffSettings, random: () => number = Math.random): number {
    const exponential = settings.initialDelayMs * Math.pow(settings.multiplier, Math.max(0, attempt));
    const capped = Math.min(settings.maxDelayMs, exponential);
    const factor = 1 - settings.jitter * random();
    return Math.round(capped * factor);
}
