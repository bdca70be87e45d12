// src/market/inputDecoder.ts
import type {
    InputKind,
    InputRecord,
    MarketEvent,
} from "../types/marketEvents.js";
import { toPresetCode } from "../indicators/thresholdPresets.js";
import { ORDER_QTY_MAX, PRICE_MAX, clamp } from "../utils/fixedPoint.js";

/**
 * Wire form of one tick: two bytes, written "XXYY" in stimulus files.
 *
 *   ui[7:6]   kind (00 price, 01 volume, 10 buy, 11 sell)
 *   ui[5:0]   low 6 bits of price/volume, or the order quantity
 *   uio[5:0]  high 6 bits of price/volume
 *   uio[7]    config strobe; the preset selector then sits in ui[1:0]
 */
export interface InputWord {
    ui: number;
    uio: number;
}

const CONFIG_STROBE = 0x80;
const LOW_BITS = 0x3f;

const KIND_BITS: Readonly<Record<Exclude<InputKind, "config">, number>> = {
    price: 0b00,
    volume: 0b01,
    buy: 0b10,
    sell: 0b11,
};

const KIND_BY_BITS = ["price", "volume", "buy", "sell"] as const;

const IDLE: MarketEvent = Object.freeze({ kind: "idle" });

const field12 = (value: number): number =>
    clamp(Math.trunc(value), 0, PRICE_MAX);

const field6 = (value: number): number =>
    clamp(Math.trunc(value), 0, ORDER_QTY_MAX);

/**
 * Classify one input record. A zero price or volume is an idle tick.
 */
export function decodeInput(record: InputRecord): MarketEvent {
    if (record.configStrobe === true || record.kind === "config") {
        return { kind: "config", preset: toPresetCode(record.value) };
    }

    switch (record.kind) {
        case "price": {
            const price = field12(record.value);
            return price === 0 ? IDLE : { kind: "price", price };
        }
        case "volume": {
            const volume = field12(record.value);
            return volume === 0 ? IDLE : { kind: "volume", volume };
        }
        case "buy":
            return { kind: "buy", quantity: field6(record.value) };
        case "sell":
            return { kind: "sell", quantity: field6(record.value) };
    }
}

export function encodeInputWord(record: InputRecord): InputWord {
    if (record.configStrobe === true || record.kind === "config") {
        return { ui: toPresetCode(record.value), uio: CONFIG_STROBE };
    }

    const kindBits = KIND_BITS[record.kind] << 6;
    if (record.kind === "price" || record.kind === "volume") {
        const value = field12(record.value);
        return { ui: kindBits | (value & LOW_BITS), uio: (value >> 6) & LOW_BITS };
    }
    return { ui: kindBits | field6(record.value), uio: 0 };
}

export function decodeInputWord(word: InputWord): InputRecord {
    const ui = word.ui & 0xff;
    const uio = word.uio & 0xff;

    if ((uio & CONFIG_STROBE) !== 0) {
        return { kind: "config", value: ui & 0b11, configStrobe: true };
    }

    const kind = KIND_BY_BITS[(ui >> 6) & 0b11] ?? "price";
    if (kind === "price" || kind === "volume") {
        return { kind, value: ((uio & LOW_BITS) << 6) | (ui & LOW_BITS) };
    }
    return { kind, value: ui & LOW_BITS };
}

/** "XXYY" hex form used by stimulus files. */
export const formatInputWord = (word: InputWord): string =>
    (((word.ui & 0xff) << 8) | (word.uio & 0xff)).toString(16).padStart(4, "0");

export function parseInputWord(text: string): InputWord | null {
    const trimmed = text.trim();
    if (!/^[0-9a-fA-F]{4}$/.test(trimmed)) return null;
    const raw = Number.parseInt(trimmed, 16);
    return { ui: raw >> 8, uio: raw & 0xff };
}

/**
 * Read a stimulus listing: one "XXYY" word per line, `//` comments and
 * blank lines ignored. Returns the 1-based numbers of unreadable lines
 * alongside the records so the caller decides how strict to be.
 */
export function parseStimulus(text: string): {
    records: InputRecord[];
    rejectedLines: number[];
} {
    const records: InputRecord[] = [];
    const rejectedLines: number[] = [];
    text.split(/\r?\n/).forEach((line, index) => {
        const content = line.replace(/\/\/.*$/, "").trim();
        if (content.length === 0) return;
        const word = parseInputWord(content);
        if (word === null) {
            rejectedLines.push(index + 1);
            return;
        }
        records.push(decodeInputWord(word));
    });
    return { records, rejectedLines };
}
