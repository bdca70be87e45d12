// src/services/cascadeDetector.ts
import type { AnomalyKind } from "../types/alertTypes.js";

export type CascadePattern =
    | "TRIPLE" // three distinct classes ending in FLASH_CRASH
    | "VOL_CRASH" // VOLUME_SURGE -> FLASH_CRASH
    | "SPIKE_CRASH" // PRICE_SPIKE -> FLASH_CRASH
    | "STUFF_CRASH"; // QUOTE_STUFFING -> FLASH_CRASH

export const CASCADE_WINDOW_TICKS = 64;
export const CASCADE_HISTORY_DEPTH = 3;
export const CASCADE_CONFIDENCE_MULTIPLIER = 2;

const PRECURSOR_PATTERNS: ReadonlyMap<AnomalyKind, CascadePattern> = new Map<
    AnomalyKind,
    CascadePattern
>([
    ["VOLUME_SURGE", "VOL_CRASH"],
    ["PRICE_SPIKE", "SPIKE_CRASH"],
    ["QUOTE_STUFFING", "STUFF_CRASH"],
]);

export interface CascadeHistoryEntry {
    readonly anomaly: AnomalyKind;
    /** Ticks since the entry was last observed */
    readonly age: number;
}

export interface CascadeState {
    /** Newest first */
    readonly history: readonly CascadeHistoryEntry[];
}

export interface CascadeObservation {
    anomaly: AnomalyKind;
    confidence: number;
}

export interface CascadeAlert {
    pattern: CascadePattern;
    /** Double the confidence of the FLASH_CRASH that completed the pattern */
    confidence: number;
    precursors: AnomalyKind[];
}

export const createCascadeDetector = (): CascadeState => ({ history: [] });

function matchPattern(
    history: readonly CascadeHistoryEntry[]
): { pattern: CascadePattern; precursors: AnomalyKind[] } | null {
    const precursors = [
        ...new Set(
            history
                .map((entry) => entry.anomaly)
                .filter((anomaly) => anomaly !== "FLASH_CRASH")
        ),
    ];
    if (precursors.length >= 2) {
        return { pattern: "TRIPLE", precursors };
    }
    for (const entry of history) {
        const pattern = PRECURSOR_PATTERNS.get(entry.anomaly);
        if (pattern !== undefined) {
            return { pattern, precursors: [entry.anomaly] };
        }
    }
    return null;
}

/**
 * Age the history, then fold in this tick's observations (rule winner
 * first, classifier verdict second). A fresh FLASH_CRASH checks the live
 * precursors before it is recorded; a repeat of the newest class only
 * refreshes its age.
 */
export function stepCascadeDetector(
    state: CascadeState,
    observations: readonly CascadeObservation[]
): { state: CascadeState; output: CascadeAlert | null } {
    let history = state.history
        .map((entry) => ({ ...entry, age: entry.age + 1 }))
        .filter((entry) => entry.age <= CASCADE_WINDOW_TICKS);
    let alert: CascadeAlert | null = null;

    for (const observation of observations) {
        const newest = history[0];
        if (newest !== undefined && newest.anomaly === observation.anomaly) {
            history = [{ anomaly: observation.anomaly, age: 0 }, ...history.slice(1)];
            continue;
        }

        if (observation.anomaly === "FLASH_CRASH" && alert === null) {
            const matched = matchPattern(history);
            if (matched !== null) {
                alert = {
                    ...matched,
                    confidence:
                        observation.confidence * CASCADE_CONFIDENCE_MULTIPLIER,
                };
            }
        }

        history = [
            { anomaly: observation.anomaly, age: 0 },
            ...history,
        ].slice(0, CASCADE_HISTORY_DEPTH);
    }

    return { state: { history }, output: alert };
}
