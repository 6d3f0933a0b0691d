/**
 * Noise Engine: Laplace mechanism.
 *
 * Pure and stateless: every draw takes its randomness from a RandomSource
 * argument, so tests inject a seeded source and production uses the CSPRNG.
 *
 * Payload perturbation is component-wise: each numeric field gets its own
 * independent draw, never one shared draw for the whole payload. The ledger
 * still charges epsilon once per wrap() call covering the whole payload
 * (see privacy_ledger.ts).
 */

import * as crypto from 'crypto';
import { InvalidParameterError } from './structured_error';

/** Returns a uniform draw strictly inside (0, 1). */
export type RandomSource = () => number;

const UINT32_RANGE = 0x1_0000_0000;

function toOpenUnit(x: number): number {
    return (x + 0.5) / UINT32_RANGE;
}

export const cryptoRandom: RandomSource = () => toOpenUnit(crypto.randomBytes(4).readUInt32BE(0));

/** mulberry32; deterministic for a given seed. */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return toOpenUnit((t ^ (t >>> 14)) >>> 0);
    };
}

export function validatePrivacyParams(sensitivity: number, epsilon: number): void {
    if (!Number.isFinite(epsilon) || epsilon <= 0) {
        throw new InvalidParameterError(`epsilon must be a finite number > 0, got ${epsilon}`, { epsilon });
    }
    if (!Number.isFinite(sensitivity) || sensitivity < 0) {
        throw new InvalidParameterError(`sensitivity must be a finite number >= 0, got ${sensitivity}`, { sensitivity });
    }
}

/** Scale parameter b of Laplace(0, b). */
export function laplaceScale(sensitivity: number, epsilon: number): number {
    validatePrivacyParams(sensitivity, epsilon);
    return sensitivity / epsilon;
}

/**
 * One draw from Laplace(0, sensitivity / epsilon) by inverse CDF.
 * Throws InvalidParameterError if epsilon <= 0 or sensitivity < 0.
 */
export function sampleLaplace(sensitivity: number, epsilon: number, random: RandomSource = cryptoRandom): number {
    const b = laplaceScale(sensitivity, epsilon);
    if (b === 0) return 0;

    const v = random() - 0.5;
    if (v === 0) return 0;
    return -b * Math.sign(v) * Math.log(1 - 2 * Math.abs(v));
}
