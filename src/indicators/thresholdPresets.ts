// src/indicators/thresholdPresets.ts
import type { PresetCode } from "../types/marketEvents.js";

export interface Thresholds {
    /** |price - average| must exceed this for PRICE_SPIKE / TRADE_VELOCITY */
    spikeThresh: number;
    /** average - price must exceed this for FLASH_CRASH */
    flashThresh: number;
}

export const PRESET_NAMES = ["QUIET", "NORMAL", "SENSITIVE", "DEMO"] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

export const THRESHOLD_PRESETS: Readonly<Record<PresetName, Thresholds>> = {
    QUIET: { spikeThresh: 40, flashThresh: 80 },
    NORMAL: { spikeThresh: 20, flashThresh: 40 },
    SENSITIVE: { spikeThresh: 10, flashThresh: 20 },
    DEMO: { spikeThresh: 5, flashThresh: 10 },
};

export const presetCode = (name: PresetName): PresetCode => {
    switch (name) {
        case "QUIET":
            return 0;
        case "NORMAL":
            return 1;
        case "SENSITIVE":
            return 2;
        case "DEMO":
            return 3;
    }
};

export const presetName = (code: PresetCode): PresetName => {
    switch (code) {
        case 0:
            return "QUIET";
        case 1:
            return "NORMAL";
        case 2:
            return "SENSITIVE";
        case 3:
            return "DEMO";
    }
};

export const presetThresholds = (code: PresetCode): Thresholds =>
    THRESHOLD_PRESETS[presetName(code)];

/** Keep the two low bits; out-of-range selectors cannot exist. */
export const toPresetCode = (value: number): PresetCode => {
    switch (Math.trunc(value) & 0b11) {
        case 0:
            return 0;
        case 1:
            return 1;
        case 2:
            return 2;
        default:
            return 3;
    }
};
