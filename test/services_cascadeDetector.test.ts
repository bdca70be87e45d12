import { describe, it, expect } from "vitest";
import type {
    CascadeAlert,
    CascadeObservation,
    CascadeState,
} from "../src/services/cascadeDetector.js";
import {
    CASCADE_WINDOW_TICKS,
    createCascadeDetector,
    stepCascadeDetector,
} from "../src/services/cascadeDetector.js";
import type { AnomalyKind } from "../src/types/alertTypes.js";

const seen = (anomaly: AnomalyKind, confidence = 32): CascadeObservation[] => [
    { anomaly, confidence },
];

/** Apply one observation list per tick; returns the final state and alerts. */
const run = (ticks: CascadeObservation[][]) => {
    let state: CascadeState = createCascadeDetector();
    const alerts: (CascadeAlert | null)[] = [];
    for (const observations of ticks) {
        const step = stepCascadeDetector(state, observations);
        state = step.state;
        alerts.push(step.output);
    }
    return { state, alerts };
};

const quiet = (n: number): CascadeObservation[][] =>
    Array.from({ length: n }, () => []);

describe("services/cascadeDetector", () => {
    it("ignores a lone flash crash", () => {
        const { alerts } = run([seen("FLASH_CRASH")]);
        expect(alerts).toEqual([null]);
    });

    it("recognizes a volume surge followed by a crash", () => {
        const { alerts } = run([
            seen("VOLUME_SURGE"),
            ...quiet(3),
            seen("FLASH_CRASH", 60),
        ]);
        expect(alerts[4]).toEqual({
            pattern: "VOL_CRASH",
            confidence: 120,
            precursors: ["VOLUME_SURGE"],
        });
    });

    it("keeps a precursor alive for exactly the window", () => {
        const inside = run([
            seen("PRICE_SPIKE"),
            ...quiet(CASCADE_WINDOW_TICKS - 1),
            seen("FLASH_CRASH"),
        ]);
        expect(inside.alerts.at(-1)?.pattern).toBe("SPIKE_CRASH");

        const outside = run([
            seen("PRICE_SPIKE"),
            ...quiet(CASCADE_WINDOW_TICKS),
            seen("FLASH_CRASH"),
        ]);
        expect(outside.alerts.at(-1)).toBeNull();
    });

    it("prefers the three-event pattern", () => {
        const { alerts } = run([
            seen("VOLUME_SURGE"),
            seen("PRICE_SPIKE"),
            seen("FLASH_CRASH", 50),
        ]);
        expect(alerts[2]).toEqual({
            pattern: "TRIPLE",
            confidence: 100,
            precursors: ["PRICE_SPIKE", "VOLUME_SURGE"],
        });
    });

    it("takes the most recent two-event precursor", () => {
        const { alerts } = run([
            seen("QUOTE_STUFFING"),
            seen("QUOTE_STUFFING"),
            seen("FLASH_CRASH"),
        ]);
        expect(alerts[2]?.pattern).toBe("STUFF_CRASH");
    });

    it("refreshes the age of a repeated class", () => {
        const { state, alerts } = run([
            seen("VOLUME_SURGE"),
            ...quiet(49),
            seen("VOLUME_SURGE"),
            ...quiet(49),
            seen("FLASH_CRASH"),
        ]);
        expect(alerts.at(-1)?.pattern).toBe("VOL_CRASH");
        expect(state.history).toEqual([
            { anomaly: "FLASH_CRASH", age: 0 },
            { anomaly: "VOLUME_SURGE", age: 50 },
        ]);
    });

    it("does not fire twice for a held flash crash", () => {
        const { alerts } = run([
            seen("VOLUME_SURGE"),
            seen("FLASH_CRASH"),
            seen("FLASH_CRASH"),
        ]);
        expect(alerts[1]?.pattern).toBe("VOL_CRASH");
        expect(alerts[2]).toBeNull();
    });

    it("holds at most three entries, newest first", () => {
        const { state } = run([
            seen("VOLUME_SURGE"),
            seen("PRICE_SPIKE"),
            seen("ORDER_IMBALANCE"),
            seen("QUOTE_STUFFING"),
        ]);
        expect(state.history.map((entry) => entry.anomaly)).toEqual([
            "QUOTE_STUFFING",
            "ORDER_IMBALANCE",
            "PRICE_SPIKE",
        ]);
    });

    it("folds a rule and a classifier observation from the same tick", () => {
        const { alerts } = run([
            [
                { anomaly: "VOLUME_SURGE", confidence: 32 },
                { anomaly: "FLASH_CRASH", confidence: 70 },
            ],
        ]);
        expect(alerts[0]).toEqual({
            pattern: "VOL_CRASH",
            confidence: 140,
            precursors: ["VOLUME_SURGE"],
        });
    });
});
