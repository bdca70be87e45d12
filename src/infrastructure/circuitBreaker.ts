// src/infrastructure/circuitBreaker.ts
import type { AnomalyKind, AlertRecord, MlResult } from "../types/alertTypes.js";
import type { BookPolicy } from "../market/orderBook.js";
import type { CascadeAlert } from "../services/cascadeDetector.js";
import { U16_MAX, U8_MAX, saturateU16 } from "../utils/fixedPoint.js";

export enum CircuitMode {
    NORMAL = "NORMAL",
    THROTTLE = "THROTTLE",
    WIDEN = "WIDEN",
    PAUSE = "PAUSE",
}

export const WIDEN_SPREAD_GUARD = 2;
const DURATION_PER_CONFIDENCE = 2;
const MIN_THROTTLE_INTERVAL = 2;
const THROTTLE_CONFIDENCE_SHIFT = 5;
const FAST_PATH_PRIORITY = 7;

export type TriggerSource = "cascade" | "rule" | "ml";

export interface CircuitTrigger {
    anomaly: AnomalyKind;
    confidence: number;
    source: TriggerSource;
}

export interface CircuitBreakerState {
    readonly mode: CircuitMode;
    readonly countdown: number;
    readonly active: boolean;
    /** THROTTLE admits one order every `throttleInterval` ticks */
    readonly throttleInterval: number;
    readonly throttlePhase: number;
}

export interface CircuitTransition {
    from: CircuitMode;
    to: CircuitMode;
    reason: "trigger" | "expired";
    trigger?: CircuitTrigger;
}

export const NORMAL_STATE: CircuitBreakerState = Object.freeze({
    mode: CircuitMode.NORMAL,
    countdown: 0,
    active: false,
    throttleInterval: 0,
    throttlePhase: 0,
});

export const createCircuitBreaker = (): CircuitBreakerState => NORMAL_STATE;

export function modeFor(anomaly: AnomalyKind): CircuitMode | null {
    switch (anomaly) {
        case "FLASH_CRASH":
            return CircuitMode.PAUSE;
        case "QUOTE_STUFFING":
            return CircuitMode.THROTTLE;
        case "ORDER_IMBALANCE":
            return CircuitMode.WIDEN;
        default:
            return null;
    }
}

export const throttleIntervalFor = (confidence: number): number =>
    MIN_THROTTLE_INTERVAL +
    (Math.min(U8_MAX, confidence) >> THROTTLE_CONFIDENCE_SHIFT);

/**
 * Policy the order book applies on the tick after this state was
 * committed.
 */
export function policyFor(state: CircuitBreakerState): BookPolicy {
    switch (state.mode) {
        case CircuitMode.PAUSE:
            return { allowOrder: false, allowMatch: false, spreadGuard: 0 };
        case CircuitMode.THROTTLE:
            return {
                allowOrder: state.throttlePhase === 0,
                allowMatch: true,
                spreadGuard: 0,
            };
        case CircuitMode.WIDEN:
            return {
                allowOrder: true,
                allowMatch: true,
                spreadGuard: WIDEN_SPREAD_GUARD,
            };
        case CircuitMode.NORMAL:
            return { allowOrder: true, allowMatch: true, spreadGuard: 0 };
    }
}

/**
 * Pick at most one trigger for this tick: a cascade first, then the
 * priority-7 rule fast path, then a classifier verdict, then any other
 * rule alert.
 */
export function selectTrigger(
    cascade: CascadeAlert | null,
    rule: AlertRecord,
    ml: MlResult,
    ruleConfidence: number
): CircuitTrigger | null {
    if (cascade !== null) {
        return {
            anomaly: "FLASH_CRASH",
            confidence: cascade.confidence,
            source: "cascade",
        };
    }
    if (rule.winner !== null && rule.priority >= FAST_PATH_PRIORITY) {
        return { anomaly: rule.winner, confidence: ruleConfidence, source: "rule" };
    }
    if (ml.valid && ml.className !== "NORMAL") {
        return { anomaly: ml.className, confidence: ml.confidence, source: "ml" };
    }
    if (rule.winner !== null) {
        return { anomaly: rule.winner, confidence: ruleConfidence, source: "rule" };
    }
    return null;
}

/**
 * One tick of the breaker. Latch-once: triggers are only looked at in
 * NORMAL, and an active intervention runs its countdown to zero before
 * anything else can happen.
 */
export function stepCircuitBreaker(
    state: CircuitBreakerState,
    trigger: CircuitTrigger | null
): { state: CircuitBreakerState; transition: CircuitTransition | null } {
    if (state.active) {
        const countdown = state.countdown - 1;
        if (countdown <= 0) {
            return {
                state: NORMAL_STATE,
                transition: {
                    from: state.mode,
                    to: CircuitMode.NORMAL,
                    reason: "expired",
                },
            };
        }
        return {
            state: {
                ...state,
                countdown,
                throttlePhase:
                    state.mode === CircuitMode.THROTTLE
                        ? (state.throttlePhase + 1) % state.throttleInterval
                        : 0,
            },
            transition: null,
        };
    }

    if (trigger === null) return { state, transition: null };

    const mode = modeFor(trigger.anomaly);
    const duration = saturateU16(DURATION_PER_CONFIDENCE * trigger.confidence);
    if (mode === null || duration === 0) {
        return { state: NORMAL_STATE, transition: null };
    }

    return {
        state: {
            mode,
            countdown: Math.min(U16_MAX, duration),
            active: true,
            throttleInterval:
                mode === CircuitMode.THROTTLE
                    ? throttleIntervalFor(trigger.confidence)
                    : 0,
            throttlePhase: 0,
        },
        transition: {
            from: CircuitMode.NORMAL,
            to: mode,
            reason: "trigger",
            trigger,
        },
    };
}
