import { describe, it, expect } from "vitest";
import type {
    CircuitBreakerState,
    CircuitTrigger,
} from "../src/infrastructure/circuitBreaker.js";
import {
    CircuitMode,
    WIDEN_SPREAD_GUARD,
    createCircuitBreaker,
    policyFor,
    selectTrigger,
    stepCircuitBreaker,
    throttleIntervalFor,
} from "../src/infrastructure/circuitBreaker.js";
import type { CascadeAlert } from "../src/services/cascadeDetector.js";
import type { AlertRecord, MlResult } from "../src/types/alertTypes.js";
import { IDLE_ML_RESULT, NO_ALERT } from "../src/types/alertTypes.js";

const trigger = (
    anomaly: CircuitTrigger["anomaly"],
    confidence: number
): CircuitTrigger => ({ anomaly, confidence, source: "rule" });

const advance = (
    state: CircuitBreakerState,
    ticks: number,
    next: CircuitTrigger | null = null
): CircuitBreakerState => {
    let current = state;
    for (let i = 0; i < ticks; i++) {
        current = stepCircuitBreaker(current, next).state;
    }
    return current;
};

describe("infrastructure/circuitBreaker", () => {
    it("pauses for twice the confidence and reopens on its own", () => {
        const tripped = stepCircuitBreaker(
            createCircuitBreaker(),
            trigger("FLASH_CRASH", 60)
        );
        expect(tripped.state).toMatchObject({
            mode: CircuitMode.PAUSE,
            countdown: 120,
            active: true,
        });
        expect(tripped.transition).toMatchObject({
            from: CircuitMode.NORMAL,
            to: CircuitMode.PAUSE,
            reason: "trigger",
        });
        expect(policyFor(tripped.state)).toEqual({
            allowOrder: false,
            allowMatch: false,
            spreadGuard: 0,
        });

        const lastPausedTick = advance(tripped.state, 119);
        expect(lastPausedTick).toMatchObject({
            mode: CircuitMode.PAUSE,
            countdown: 1,
        });

        const reopened = stepCircuitBreaker(lastPausedTick, null);
        expect(reopened.state.mode).toBe(CircuitMode.NORMAL);
        expect(reopened.state.active).toBe(false);
        expect(reopened.transition?.reason).toBe("expired");
        expect(policyFor(reopened.state).allowMatch).toBe(true);
    });

    it("ignores triggers while an intervention runs", () => {
        const tripped = stepCircuitBreaker(
            createCircuitBreaker(),
            trigger("FLASH_CRASH", 60)
        ).state;
        const next = stepCircuitBreaker(tripped, trigger("FLASH_CRASH", 200));
        expect(next.state.countdown).toBe(119);
        expect(next.transition).toBeNull();
        expect(advance(tripped, 120, trigger("FLASH_CRASH", 200)).mode).toBe(
            CircuitMode.NORMAL
        );
    });

    it("throttles orders to one per interval", () => {
        expect(throttleIntervalFor(0)).toBe(2);
        expect(throttleIntervalFor(100)).toBe(5);
        expect(throttleIntervalFor(1000)).toBe(9);

        let state = stepCircuitBreaker(
            createCircuitBreaker(),
            trigger("QUOTE_STUFFING", 100)
        ).state;
        expect(state).toMatchObject({
            mode: CircuitMode.THROTTLE,
            countdown: 200,
            throttleInterval: 5,
        });

        const admitted: boolean[] = [policyFor(state).allowOrder];
        for (let i = 0; i < 5; i++) {
            state = stepCircuitBreaker(state, null).state;
            admitted.push(policyFor(state).allowOrder);
        }
        expect(admitted).toEqual([true, false, false, false, false, true]);
        expect(policyFor(state).allowMatch).toBe(true);
    });

    it("widens the spread on order imbalance", () => {
        const { state } = stepCircuitBreaker(
            createCircuitBreaker(),
            trigger("ORDER_IMBALANCE", 32)
        );
        expect(state.mode).toBe(CircuitMode.WIDEN);
        expect(policyFor(state)).toEqual({
            allowOrder: true,
            allowMatch: true,
            spreadGuard: WIDEN_SPREAD_GUARD,
        });
    });

    it("ignores zero-duration and unmapped triggers", () => {
        const start = createCircuitBreaker();
        expect(stepCircuitBreaker(start, trigger("FLASH_CRASH", 0)).state).toBe(
            start
        );
        const spike = stepCircuitBreaker(start, trigger("PRICE_SPIKE", 60));
        expect(spike.state.mode).toBe(CircuitMode.NORMAL);
        expect(spike.transition).toBeNull();
    });

    it("saturates the countdown", () => {
        const { state } = stepCircuitBreaker(
            createCircuitBreaker(),
            trigger("FLASH_CRASH", 40000)
        );
        expect(state.countdown).toBe(65535);
    });

    describe("selectTrigger", () => {
        const flash: AlertRecord = {
            any: true,
            priority: 7,
            type: 7,
            bitmap: 0x80,
            winner: "FLASH_CRASH",
        };
        const imbalance: AlertRecord = {
            any: true,
            priority: 4,
            type: 4,
            bitmap: 0x10,
            winner: "ORDER_IMBALANCE",
        };
        const stuffing: MlResult = {
            mlClass: 5,
            className: "QUOTE_STUFFING",
            confidence: 90,
            valid: true,
        };

        it("puts a cascade first", () => {
            const cascade: CascadeAlert = {
                pattern: "VOL_CRASH",
                confidence: 120,
                precursors: ["VOLUME_SURGE"],
            };
            expect(selectTrigger(cascade, flash, stuffing, 32)).toEqual({
                anomaly: "FLASH_CRASH",
                confidence: 120,
                source: "cascade",
            });
        });

        it("takes the priority-7 rule over the classifier", () => {
            expect(selectTrigger(null, flash, stuffing, 32)).toEqual({
                anomaly: "FLASH_CRASH",
                confidence: 32,
                source: "rule",
            });
        });

        it("takes the classifier over a lesser rule", () => {
            expect(selectTrigger(null, imbalance, stuffing, 32)).toEqual({
                anomaly: "QUOTE_STUFFING",
                confidence: 90,
                source: "ml",
            });
            expect(
                selectTrigger(null, imbalance, IDLE_ML_RESULT, 32)
            ).toEqual({
                anomaly: "ORDER_IMBALANCE",
                confidence: 32,
                source: "rule",
            });
        });

        it("returns null when nothing fired", () => {
            expect(
                selectTrigger(
                    null,
                    NO_ALERT,
                    { ...stuffing, className: "NORMAL", mlClass: 0 },
                    32
                )
            ).toBeNull();
        });
    });
});
