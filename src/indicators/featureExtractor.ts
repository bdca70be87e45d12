// src/indicators/featureExtractor.ts
import type { RollingStats } from "./rollingStatistics.js";
import { orderCount } from "./rollingStatistics.js";
import { clamp, offsetByte, saturateU8 } from "../utils/fixedPoint.js";

export const FEATURE_COUNT = 16;

/** Fixed stand-ins for signals this feed cannot observe. */
export const CANCEL_RATE_PLACEHOLDER = 10;
export const ORDER_LIFESPAN_PLACEHOLDER = 200;
export const RESERVED_FEATURE = 128;

export type FeatureVector = readonly number[];

export interface FeatureExtractorState {
    /** Newest price at the previous snapshot, for the long-horizon delta */
    readonly snapshotPrice: number | null;
    /** Snapshot registered for the classifier to pick up next tick */
    readonly pending: FeatureVector | null;
}

export interface FeatureExtractorOutput {
    featureValid: boolean;
    features: FeatureVector | null;
}

export const createFeatureExtractor = (): FeatureExtractorState => ({
    snapshotPrice: null,
    pending: null,
});

/**
 * Build the 16-byte feature vector from the statistics.
 *
 *  0 short delta        1 medium delta      2 long delta     3 volume ratio
 *  4 spread proxy       5 buy/sell balance  6 volatility     7 order arrivals
 *  8 cancel rate (fix)  9 buy depth        10 sell depth    11 ticks since match
 * 12 lifespan (fix)    13 trade frequency  14 momentum      15 reserved
 */
export function extractFeatures(
    stats: RollingStats,
    snapshotPrice: number | null
): FeatureVector {
    const latest = stats.prices.latest() ?? 0;
    const previous = stats.prices.latest(1) ?? latest;
    const older = stats.prices.latest(2) ?? previous;
    const priceAverage = stats.prices.average();
    const volumeAverage = stats.volumes.average();

    const buys = stats.buyCount;
    const sells = stats.sellCount;
    const total = buys + sells;

    return [
        offsetByte(latest - previous),
        offsetByte(latest - priceAverage),
        offsetByte(latest - (snapshotPrice ?? latest)),
        volumeAverage > 0
            ? saturateU8(Math.floor((stats.lastVolume * 64) / volumeAverage))
            : 0,
        saturateU8((stats.prices.max() ?? 0) - (stats.prices.min() ?? 0)),
        total > 0
            ? clamp(Math.floor(((buys - sells) * 128) / total) + 128, 0, 255)
            : 128,
        saturateU8(stats.priceMad * 4),
        saturateU8(orderCount(stats)),
        CANCEL_RATE_PLACEHOLDER,
        saturateU8(buys),
        saturateU8(sells),
        saturateU8(stats.ticksSinceMatch),
        ORDER_LIFESPAN_PLACEHOLDER,
        saturateU8(stats.matchCount),
        offsetByte(latest - previous - (previous - older)),
        RESERVED_FEATURE,
    ];
}

/**
 * Snapshot on the last tick of each 256-tick window, with a one-tick
 * `featureValid` pulse.
 */
export function stepFeatureExtractor(
    state: FeatureExtractorState,
    stats: RollingStats,
    boundary: boolean
): { state: FeatureExtractorState; output: FeatureExtractorOutput } {
    if (!boundary) {
        return {
            state: { ...state, pending: null },
            output: { featureValid: false, features: null },
        };
    }

    const features = extractFeatures(stats, state.snapshotPrice);
    return {
        state: {
            snapshotPrice: stats.prices.latest() ?? state.snapshotPrice,
            pending: features,
        },
        output: { featureValid: true, features },
    };
}
