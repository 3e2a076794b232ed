import type { StepEntry, StepName } from '../types/output.js';

export function createStepEntry(step: StepName, details: string, now: Date = new Date()): StepEntry {
    return {
        step,
        timestamp: now.toISOString(),
        details,
    };
}
