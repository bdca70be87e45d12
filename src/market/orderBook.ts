// src/market/orderBook.ts
import type { MarketEvent } from "../types/marketEvents.js";
import { isOrderEvent } from "../types/marketEvents.js";

export type OrderSide = "bid" | "ask";

export const BOOK_DEPTH = 4;
export const ORDER_PRICE_MASK = 0x7f;

export interface OrderBookEntry {
    readonly side: OrderSide;
    readonly price: number;
    readonly occupied: boolean;
    /** Arrival stamp; the older entry wins between equal prices. */
    readonly seq: number;
}

export interface OrderBookState {
    readonly bids: readonly OrderBookEntry[];
    readonly asks: readonly OrderBookEntry[];
    readonly nextSeq: number;
}

/**
 * Admission policy handed down by the circuit breaker.
 */
export interface BookPolicy {
    allowOrder: boolean;
    allowMatch: boolean;
    /** Extra ticks a bid must clear the ask by before a match is allowed. */
    spreadGuard: number;
}

export const OPEN_POLICY: BookPolicy = Object.freeze({
    allowOrder: true,
    allowMatch: true,
    spreadGuard: 0,
});

export interface OrderBookOutput {
    matchValid: boolean;
    matchPrice: number;
    /** Order event that did not make it into the book this tick. */
    orderDropped: boolean;
    bestBid: number | undefined;
    bestAsk: number | undefined;
}

const emptySide = (side: OrderSide): OrderBookEntry[] =>
    Array.from({ length: BOOK_DEPTH }, () => ({
        side,
        price: 0,
        occupied: false,
        seq: 0,
    }));

export const createOrderBook = (): OrderBookState => ({
    bids: emptySide("bid"),
    asks: emptySide("ask"),
    nextSeq: 0,
});

export const occupiedCount = (entries: readonly OrderBookEntry[]): number =>
    entries.filter((entry) => entry.occupied).length;

/**
 * Index of the best entry on one side: highest bid / lowest ask, oldest
 * first between equal prices. -1 when the side is empty.
 */
export function bestIndex(entries: readonly OrderBookEntry[]): number {
    let best = -1;
    entries.forEach((entry, index) => {
        if (!entry.occupied) return;
        const current = entries[best];
        if (current === undefined) {
            best = index;
            return;
        }
        const better =
            entry.side === "bid"
                ? entry.price > current.price
                : entry.price < current.price;
        if (better || (entry.price === current.price && entry.seq < current.seq)) {
            best = index;
        }
    });
    return best;
}

const freeSlot = (
    entries: readonly OrderBookEntry[],
    index: number
): OrderBookEntry[] =>
    entries.map((entry, i) =>
        i === index ? { ...entry, occupied: false } : entry
    );

/**
 * One tick of the order book.
 *
 * Matching looks at the book as it stood at the start of the tick, so an
 * order inserted now is first eligible next tick and a slot freed by a
 * match is reusable from the next tick on. With `allowMatch` off the book
 * is frozen entirely.
 */
export function stepOrderBook(
    state: OrderBookState,
    event: MarketEvent,
    policy: BookPolicy
): { state: OrderBookState; output: OrderBookOutput } {
    const bidIndex = bestIndex(state.bids);
    const askIndex = bestIndex(state.asks);
    const bestBid = state.bids[bidIndex]?.price;
    const bestAsk = state.asks[askIndex]?.price;

    const frozen: OrderBookOutput = {
        matchValid: false,
        matchPrice: 0,
        orderDropped: isOrderEvent(event),
        bestBid,
        bestAsk,
    };
    if (!policy.allowMatch) {
        return { state, output: frozen };
    }

    let bids: readonly OrderBookEntry[] = state.bids;
    let asks: readonly OrderBookEntry[] = state.asks;
    let nextSeq = state.nextSeq;
    let orderDropped = false;

    if (isOrderEvent(event)) {
        const side: OrderSide = event.kind === "buy" ? "bid" : "ask";
        const entries = side === "bid" ? bids : asks;
        const slot = entries.findIndex((entry) => !entry.occupied);
        if (!policy.allowOrder || slot < 0) {
            orderDropped = true;
        } else {
            const inserted = entries.map((entry, i) =>
                i === slot
                    ? {
                          side,
                          price: event.quantity & ORDER_PRICE_MASK,
                          occupied: true,
                          seq: nextSeq,
                      }
                    : entry
            );
            nextSeq++;
            if (side === "bid") bids = inserted;
            else asks = inserted;
        }
    }

    let matchValid = false;
    let matchPrice = 0;
    if (
        bestBid !== undefined &&
        bestAsk !== undefined &&
        bestBid >= bestAsk + policy.spreadGuard
    ) {
        // Maker (resting ask) sets the price.
        matchValid = true;
        matchPrice = bestAsk;
        bids = freeSlot(bids, bidIndex);
        asks = freeSlot(asks, askIndex);
    }

    return {
        state: { bids, asks, nextSeq },
        output: { matchValid, matchPrice, orderDropped, bestBid, bestAsk },
    };
}
