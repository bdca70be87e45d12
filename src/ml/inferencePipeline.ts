// src/ml/inferencePipeline.ts
import type { FeatureVector } from "../indicators/featureExtractor.js";
import type { MlResult } from "../types/alertTypes.js";
import { IDLE_ML_RESULT, mlClassName } from "../types/alertTypes.js";
import type { ModelWeights } from "./modelWeights.js";
import { saturateU8, toInt32 } from "../utils/fixedPoint.js";

export const PIPELINE_LATENCY_TICKS = 4;
const ACTIVATION_SHIFT = 8;
const CONFIDENCE_SHIFT = 8;

/**
 * Stage registers of the classifier. Each tick every stage consumes the
 * register of the stage before it, so a snapshot latched into stage 0
 * surfaces as a result three ticks later.
 */
export interface InferencePipelineState {
    readonly latched: FeatureVector | null;
    readonly hidden: readonly number[] | null;
    readonly logits: readonly number[] | null;
    readonly result: MlResult;
}

export const createInferencePipeline = (): InferencePipelineState => ({
    latched: null,
    hidden: null,
    logits: null,
    result: IDLE_ML_RESULT,
});

/**
 * Hidden layer: signed 32-bit MAC plus bias, ReLU, floor shift by 8,
 * clamp to a byte.
 */
export function hiddenLayer(
    features: FeatureVector,
    weights: ModelWeights
): number[] {
    return weights.b1.map((bias, unit) => {
        let acc = 0;
        features.forEach((feature, input) => {
            acc = toInt32(acc + feature * (weights.w1[input]?.[unit] ?? 0));
        });
        acc = toInt32(acc + bias);
        return saturateU8(Math.max(0, acc) >> ACTIVATION_SHIFT);
    });
}

/** Output layer: plain MAC plus bias, no activation. */
export function outputLayer(
    hidden: readonly number[],
    weights: ModelWeights
): number[] {
    return weights.b2.map((bias, unit) => {
        let acc = 0;
        hidden.forEach((activation, input) => {
            acc = toInt32(acc + activation * (weights.w2[input]?.[unit] ?? 0));
        });
        return toInt32(acc + bias);
    });
}

/**
 * Argmax with strict `>` (ties keep the lowest index); confidence is the
 * max-min logit margin shifted down to a byte, not a probability.
 */
export function classify(logits: readonly number[]): MlResult {
    let best = 0;
    let max = logits[0] ?? 0;
    let min = max;
    logits.forEach((logit, index) => {
        if (logit > max) {
            max = logit;
            best = index;
        }
        if (logit < min) min = logit;
    });
    return {
        mlClass: best,
        className: mlClassName(best),
        confidence: saturateU8(Math.floor((max - min) / 2 ** CONFIDENCE_SHIFT)),
        valid: true,
    };
}

/**
 * Advance every stage by one tick. `features` is the snapshot the
 * extractor registered on the previous tick, or null.
 */
export function stepInferencePipeline(
    state: InferencePipelineState,
    features: FeatureVector | null,
    weights: ModelWeights
): { state: InferencePipelineState; output: MlResult } {
    const result: MlResult =
        state.logits !== null
            ? classify(state.logits)
            : { ...state.result, valid: false };

    const next: InferencePipelineState = {
        latched: features,
        hidden: state.latched !== null ? hiddenLayer(state.latched, weights) : null,
        logits: state.hidden !== null ? outputLayer(state.hidden, weights) : null,
        result,
    };
    return { state: next, output: result };
}
