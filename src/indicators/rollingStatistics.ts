// src/indicators/rollingStatistics.ts
import type { MarketEvent } from "../types/marketEvents.js";
import { RollingWindow } from "../utils/rollingWindow.js";
import { U16_MAX, saturateU16, shiftRight } from "../utils/fixedPoint.js";

export const SAMPLE_WINDOW = 8;
export const WINDOW_TICKS = 256;

/**
 * Moving price/volume statistics plus order-flow counters.
 *
 * Counters saturate at 65535 and are halved (not cleared) at every
 * 256-tick window boundary.
 */
export interface RollingStats {
    readonly prices: RollingWindow;
    readonly volumes: RollingWindow;
    /** Real samples seen so far, saturating at SAMPLE_WINDOW */
    readonly priceSamples: number;
    readonly volumeSamples: number;
    /** Exponential estimate of mean absolute deviation of price */
    readonly priceMad: number;
    /** Move of the newest price against the one before (0 until two prices) */
    readonly lastDelta: number;
    readonly lastVolume: number;
    readonly buyCount: number;
    readonly sellCount: number;
    readonly matchCount: number;
    /** Smoothed matches-per-window, refreshed at each boundary */
    readonly matchBaseline: number;
    readonly ticksSinceMatch: number;
    /** Position of the current tick inside the 256-tick window */
    readonly tickInWindow: number;
}

export const createRollingStats = (): RollingStats => ({
    prices: RollingWindow.empty(SAMPLE_WINDOW),
    volumes: RollingWindow.empty(SAMPLE_WINDOW),
    priceSamples: 0,
    volumeSamples: 0,
    priceMad: 0,
    lastDelta: 0,
    lastVolume: 0,
    buyCount: 0,
    sellCount: 0,
    matchCount: 0,
    matchBaseline: 0,
    ticksSinceMatch: 0,
    tickInWindow: 0,
});

/** Detectors stay silent until both windows hold 8 real samples. */
export const isWarm = (stats: RollingStats): boolean =>
    stats.priceSamples >= SAMPLE_WINDOW && stats.volumeSamples >= SAMPLE_WINDOW;

export const orderCount = (stats: RollingStats): number =>
    saturateU16(stats.buyCount + stats.sellCount);

export const isWindowBoundary = (stats: RollingStats): boolean =>
    stats.tickInWindow === WINDOW_TICKS - 1;

const bump = (counter: number): number => Math.min(U16_MAX, counter + 1);

/**
 * Fold this tick's event and match outcome into the statistics. Idle
 * ticks leave the windows untouched.
 */
export function absorbEvent(
    stats: RollingStats,
    event: MarketEvent,
    matchValid: boolean
): RollingStats {
    let next: RollingStats = {
        ...stats,
        matchCount: matchValid ? bump(stats.matchCount) : stats.matchCount,
        ticksSinceMatch: matchValid ? 0 : bump(stats.ticksSinceMatch),
    };

    switch (event.kind) {
        case "price": {
            const previous = stats.prices.latest();
            let priceMad = stats.priceMad;
            if (previous !== undefined) {
                const deviation = Math.abs(
                    event.price - stats.prices.average()
                );
                priceMad += shiftRight(deviation - priceMad, 3);
            }
            next = {
                ...next,
                prices: stats.prices.push(event.price),
                priceSamples: Math.min(SAMPLE_WINDOW, stats.priceSamples + 1),
                priceMad,
                lastDelta:
                    previous === undefined ? 0 : event.price - previous,
            };
            break;
        }
        case "volume":
            next = {
                ...next,
                volumes: stats.volumes.push(event.volume),
                volumeSamples: Math.min(
                    SAMPLE_WINDOW,
                    stats.volumeSamples + 1
                ),
                lastVolume: event.volume,
            };
            break;
        case "buy":
            next = { ...next, buyCount: bump(stats.buyCount) };
            break;
        case "sell":
            next = { ...next, sellCount: bump(stats.sellCount) };
            break;
        case "idle":
        case "config":
            break;
    }

    return next;
}

/**
 * Advance the window position; at the boundary decay the counters and
 * refresh the match-rate baseline.
 */
export function rollWindow(stats: RollingStats): RollingStats {
    if (!isWindowBoundary(stats)) {
        return { ...stats, tickInWindow: stats.tickInWindow + 1 };
    }
    return {
        ...stats,
        buyCount: stats.buyCount >> 1,
        sellCount: stats.sellCount >> 1,
        matchCount: stats.matchCount >> 1,
        matchBaseline: (stats.matchBaseline * 3 + stats.matchCount) >> 2,
        tickInWindow: 0,
    };
}

export const updateRollingStats = (
    stats: RollingStats,
    event: MarketEvent,
    matchValid: boolean
): RollingStats => rollWindow(absorbEvent(stats, event, matchValid));
