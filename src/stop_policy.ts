/**
 * Evolution stop policy.
 *
 * Checked after every cycle. First matching rule wins:
 *   1. max_cycles         cycle count reached the configured maximum
 *   2. converged          best score improved by less than the threshold
 *   3. cycle_time_budget  the cycle ran longer than its wall-clock budget
 *   4. target_reached     best score reached the configured target
 */

import type { StopReason } from './types';

export interface StopInput {
    cycle: number;
    max_cycles: number;
    /** Best aggregate of the previous cycle; null after the first cycle. */
    previous_best: number | null;
    current_best: number;
    convergence_threshold: number;
    cycle_elapsed_ms: number;
    cycle_time_budget_ms: number;
    target_score: number | null;
}

export function evaluateStop(input: StopInput): StopReason | null {
    if (input.cycle >= input.max_cycles) return 'max_cycles';
    if (input.previous_best !== null && input.current_best - input.previous_best < input.convergence_threshold) {
        return 'converged';
    }
    if (input.cycle_elapsed_ms > input.cycle_time_budget_ms) return 'cycle_time_budget';
    if (input.target_score !== null && input.current_best >= input.target_score) return 'target_reached';
    return null;
}
