/**
 * Stage Prompts
 *
 * Each stage has its own prompt builder and system prompt.
 */

export { GAP_DETECTION_SYSTEM, getGapDetectionPrompt } from './gap_detection';
export { DEBATE_SYSTEM, getDebatePrompt } from './debate';
export { HYPOTHESIS_SYSTEM, getHypothesisPrompt } from './hypothesis';
export { EVOLUTION_SYSTEM, getEvolutionPrompt } from './evolution';
