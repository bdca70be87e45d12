// src/indicators/ruleDetector.ts
import type { MarketEvent } from "../types/marketEvents.js";
import type { AlertRecord, AnomalyKind } from "../types/alertTypes.js";
import {
    DETECTOR_PRIORITY,
    NO_ALERT,
    detectorCode,
} from "../types/alertTypes.js";
import type { RollingStats } from "./rollingStatistics.js";
import { isWarm, orderCount } from "./rollingStatistics.js";
import type { Thresholds } from "./thresholdPresets.js";

export interface RuleDetectorOptions {
    /** VOLUME_SURGE needs the volume average above this floor */
    volumeFloor: number;
}

const IMBALANCE_RATIO = 3;
const IMBALANCE_MIN_ORDERS = 8;
const SURGE_RATIO = 3;
const MAD_MULTIPLIER = 4;

const STUFFING_MIN_ORDERS = 50;
const STUFFING_MIN_PER_SIDE = 20;
const STUFFING_MIN_BASELINE = 6;
const STUFFING_MATCH_RATIO = 8;
const STUFFING_MIN_TICKS = 128;

/** Evaluation order is priority order; the first hit wins. */
const BY_PRIORITY: readonly AnomalyKind[] = [
    "FLASH_CRASH",
    "PRICE_SPIKE",
    "VOLUME_SURGE",
    "ORDER_IMBALANCE",
    "QUOTE_STUFFING",
    "TRADE_VELOCITY",
];

/**
 * Rule detectors for one tick.
 *
 * `before` is the statistics snapshot at the start of the tick; price and
 * volume samples are judged against it. Order-flow rules read `after`, whose
 * counters already include the current order. Only order ticks evaluate the
 * order-flow rules.
 */
export function evaluateRules(
    before: RollingStats,
    after: RollingStats,
    event: MarketEvent,
    thresholds: Thresholds,
    options: RuleDetectorOptions
): AlertRecord {
    const fired = new Set<AnomalyKind>();
    const warm = isWarm(before);

    if (warm && event.kind === "price") {
        const average = before.prices.average();
        const deviation = Math.abs(event.price - average);

        if (average - event.price > thresholds.flashThresh) {
            fired.add("FLASH_CRASH");
        }
        if (
            deviation > thresholds.spikeThresh &&
            deviation > MAD_MULTIPLIER * before.priceMad
        ) {
            fired.add("PRICE_SPIKE");
        }

        const previous = before.prices.latest();
        const delta = previous === undefined ? 0 : event.price - previous;
        if (
            Math.abs(delta) > thresholds.spikeThresh &&
            Math.abs(before.lastDelta) > thresholds.spikeThresh &&
            Math.sign(delta) === Math.sign(before.lastDelta)
        ) {
            fired.add("TRADE_VELOCITY");
        }
    }

    if (warm && event.kind === "volume") {
        const average = before.volumes.average();
        if (
            event.volume > SURGE_RATIO * average &&
            average > options.volumeFloor
        ) {
            fired.add("VOLUME_SURGE");
        }
    }

    if (event.kind === "buy" || event.kind === "sell") {
        const dominant = Math.max(after.buyCount, after.sellCount);
        const other = Math.min(after.buyCount, after.sellCount);
        if (
            dominant > IMBALANCE_RATIO * other &&
            dominant >= IMBALANCE_MIN_ORDERS
        ) {
            fired.add("ORDER_IMBALANCE");
        }

        const orders = orderCount(after);
        if (
            orders > STUFFING_MIN_ORDERS &&
            after.buyCount > STUFFING_MIN_PER_SIDE &&
            after.sellCount > STUFFING_MIN_PER_SIDE &&
            after.matchBaseline > STUFFING_MIN_BASELINE &&
            orders > STUFFING_MATCH_RATIO * after.matchCount &&
            before.tickInWindow >= STUFFING_MIN_TICKS
        ) {
            fired.add("QUOTE_STUFFING");
        }
    }

    // VOL_DRY and SPREAD_WIDENING have no observable signal here.

    const winner = BY_PRIORITY.find((kind) => fired.has(kind));
    if (winner === undefined) return NO_ALERT;

    let bitmap = 0;
    for (const kind of fired) bitmap |= 1 << detectorCode(kind);

    return {
        any: true,
        priority: DETECTOR_PRIORITY[winner],
        type: detectorCode(winner),
        bitmap,
        winner,
    };
}
