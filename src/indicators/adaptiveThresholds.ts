// src/indicators/adaptiveThresholds.ts
import type { MarketEvent } from "../types/marketEvents.js";
import type { Thresholds } from "./thresholdPresets.js";
import {
    PRICE_MAX,
    U16_MAX,
    bitLength,
    clamp,
    shiftRight,
} from "../utils/fixedPoint.js";

export type ThresholdMode = "preset" | "adaptive";

/** Samples before the adaptive output is trusted (also the EWMA span). */
export const ADAPTIVE_MIN_SAMPLES = 64;
const EWMA_SHIFT = 6;
const MEAN_FRACTION_BITS = 8;
const VARIANCE_MAX = 1 << 24;

export const SPIKE_SIGMA_MULTIPLIER = 3;
export const FLASH_SIGMA_MULTIPLIER = 4;
export const SPIKE_FLOOR = 10;
export const FLASH_FLOOR = 15;

/**
 * sqrt lookup indexed by the bit length of the variance: entry k is the
 * rounded root of the middle of [2^(k-1), 2^k).
 */
const SIGMA_BY_BIT_LENGTH: readonly number[] = [
    0, 1, 1, 2, 3, 5, 7, 10, 14, 19, 27, 39, 54, 77, 109, 154, 218, 255,
];

export const sigmaFromVariance = (variance: number): number =>
    SIGMA_BY_BIT_LENGTH[
        Math.min(bitLength(variance), SIGMA_BY_BIT_LENGTH.length - 1)
    ] ?? 255;

/**
 * Two-stage pipeline. Stage 1 folds a price into the running mean (Q8) and
 * variance; stage 2 turns last tick's variance into registered thresholds.
 * A price seen at tick t therefore shapes the thresholds used at t+2.
 */
export interface AdaptiveThresholdState {
    readonly meanFx: number;
    readonly variance: number;
    readonly samples: number;
    readonly output: Thresholds | null;
}

export const createAdaptiveThresholds = (): AdaptiveThresholdState => ({
    meanFx: 0,
    variance: 0,
    samples: 0,
    output: null,
});

export function deriveThresholds(variance: number): Thresholds {
    const sigma = sigmaFromVariance(variance);
    return {
        spikeThresh: clamp(SPIKE_SIGMA_MULTIPLIER * sigma, SPIKE_FLOOR, PRICE_MAX),
        flashThresh: clamp(FLASH_SIGMA_MULTIPLIER * sigma, FLASH_FLOOR, PRICE_MAX),
    };
}

export function stepAdaptiveThresholds(
    state: AdaptiveThresholdState,
    event: MarketEvent
): AdaptiveThresholdState {
    const output =
        state.samples >= ADAPTIVE_MIN_SAMPLES
            ? deriveThresholds(state.variance)
            : null;

    if (event.kind !== "price") {
        return { ...state, output };
    }

    const sampleFx = event.price << MEAN_FRACTION_BITS;
    if (state.samples === 0) {
        return { meanFx: sampleFx, variance: 0, samples: 1, output };
    }

    const oldMean = state.meanFx >> MEAN_FRACTION_BITS;
    const meanFx = state.meanFx + shiftRight(sampleFx - state.meanFx, EWMA_SHIFT);
    const newMean = meanFx >> MEAN_FRACTION_BITS;
    // Welford-style product of deviations from the old and new mean.
    const spread = (event.price - oldMean) * (event.price - newMean);
    const variance = clamp(
        state.variance + shiftRight(spread - state.variance, EWMA_SHIFT),
        0,
        VARIANCE_MAX
    );

    return {
        meanFx,
        variance,
        samples: Math.min(U16_MAX, state.samples + 1),
        output,
    };
}

/**
 * Thresholds in force this tick: the registered adaptive output once it
 * is ready and adaptive mode is selected, the preset otherwise.
 */
export const currentThresholds = (
    state: AdaptiveThresholdState,
    preset: Thresholds,
    mode: ThresholdMode
): Thresholds =>
    mode === "adaptive" && state.output !== null ? state.output : preset;
