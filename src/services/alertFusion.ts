// src/services/alertFusion.ts
import type { AlertRecord, MlResult } from "../types/alertTypes.js";
import { IDLE_ML_RESULT, mlClassPriority } from "../types/alertTypes.js";

export type AlertSource = "rule" | "ml" | "none";

export interface FusionState {
    /** Latest classifier verdict; never expires, only superseded */
    readonly held: MlResult;
}

export interface FusedAlert {
    active: boolean;
    priority: number;
    /** Detector type code when `source` is rule, ML class code when ml */
    type: number;
    source: AlertSource;
    bitmap: number;
    held: MlResult;
}

export const createAlertFusion = (): FusionState => ({
    held: IDLE_ML_RESULT,
});

/**
 * Merge the rule record with the held classifier verdict. Equal
 * priorities go to the rule path.
 */
export function stepAlertFusion(
    state: FusionState,
    rule: AlertRecord,
    ml: MlResult
): { state: FusionState; output: FusedAlert } {
    const held = ml.valid ? ml : state.held;
    const mlPriority = mlClassPriority(held.className);
    const active = rule.any || held.className !== "NORMAL";
    const ruleWins = rule.priority >= mlPriority;

    let source: AlertSource = "none";
    if (active) source = ruleWins ? "rule" : "ml";

    return {
        state: { held },
        output: {
            active,
            priority: Math.max(rule.priority, mlPriority),
            type: ruleWins ? rule.type : held.mlClass,
            source,
            bitmap: rule.bitmap,
            held,
        },
    };
}
