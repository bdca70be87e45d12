// src/types/marketEvents.ts

/** Two-bit threshold preset selector carried on the config channel. */
export type PresetCode = 0 | 1 | 2 | 3;

export type InputKind = "price" | "volume" | "buy" | "sell" | "config";

/**
 * One tick of input as delivered by the stimulus source.
 *
 * `value` is 0..4095 for price and volume, 0..63 for an order quantity and
 * 0..3 for a config preset.
 */
export interface InputRecord {
    kind: InputKind;
    value: number;
    configStrobe?: boolean;
}

export type MarketEvent =
    | { kind: "idle" }
    | { kind: "price"; price: number }
    | { kind: "volume"; volume: number }
    | { kind: "buy"; quantity: number }
    | { kind: "sell"; quantity: number }
    | { kind: "config"; preset: PresetCode };

export type OrderEvent = Extract<MarketEvent, { kind: "buy" | "sell" }>;

export const isOrderEvent = (event: MarketEvent): event is OrderEvent =>
    event.kind === "buy" || event.kind === "sell";
