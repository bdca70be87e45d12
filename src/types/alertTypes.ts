// src/types/alertTypes.ts

/**
 * Every anomaly the engine can name. The order of `DETECTOR_KINDS` is the
 * detector type code and the bit index inside an alert bitmap.
 */
export const DETECTOR_KINDS = [
    "PRICE_SPIKE", // 0
    "VOL_DRY", // 1 - no signal on this interface, never fires
    "VOLUME_SURGE", // 2
    "TRADE_VELOCITY", // 3
    "ORDER_IMBALANCE", // 4
    "SPREAD_WIDENING", // 5 - no signal on this interface, never fires
    "QUOTE_STUFFING", // 6
    "FLASH_CRASH", // 7
] as const;

export type AnomalyKind = (typeof DETECTOR_KINDS)[number];

export const DETECTOR_PRIORITY: Readonly<Record<AnomalyKind, number>> = {
    FLASH_CRASH: 7,
    PRICE_SPIKE: 6,
    VOLUME_SURGE: 5,
    ORDER_IMBALANCE: 4,
    QUOTE_STUFFING: 3,
    TRADE_VELOCITY: 2,
    VOL_DRY: 0,
    SPREAD_WIDENING: 0,
};

export const detectorCode = (kind: AnomalyKind): number =>
    DETECTOR_KINDS.indexOf(kind);

/** Output classes of the neural classifier, indexed by class code. */
export const ML_CLASSES = [
    "NORMAL",
    "PRICE_SPIKE",
    "VOLUME_SURGE",
    "FLASH_CRASH",
    "ORDER_IMBALANCE",
    "QUOTE_STUFFING",
] as const;

export type MlClassName = (typeof ML_CLASSES)[number];

export const mlClassName = (code: number): MlClassName =>
    ML_CLASSES[code] ?? "NORMAL";

/** A classifier verdict ranks the same as the rule detector of the same name. */
export const mlClassPriority = (name: MlClassName): number =>
    name === "NORMAL" ? 0 : DETECTOR_PRIORITY[name];

/**
 * Result of one tick of rule evaluation.
 *
 * `bitmap` records every detector that fired; `priority`/`type` belong to
 * the single highest-priority winner.
 */
export interface AlertRecord {
    any: boolean;
    priority: number;
    type: number;
    bitmap: number;
    winner: AnomalyKind | null;
}

export const NO_ALERT: AlertRecord = Object.freeze({
    any: false,
    priority: 0,
    type: 0,
    bitmap: 0,
    winner: null,
});

export interface MlResult {
    mlClass: number;
    className: MlClassName;
    confidence: number;
    valid: boolean;
}

export const IDLE_ML_RESULT: MlResult = Object.freeze({
    mlClass: 0,
    className: "NORMAL",
    confidence: 0,
    valid: false,
});
