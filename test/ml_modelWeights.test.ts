import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import {
    HIDDEN_UNITS,
    OUTPUT_UNITS,
    createModelWeights,
    loadModelWeights,
    parseHexWords,
} from "../src/ml/modelWeights.js";
import { ModelWeightsError } from "../src/core/errors.js";

const defaultModelDir = fileURLToPath(
    new URL("../models/default", import.meta.url)
);

const zeros = (length: number): number[] =>
    Array.from({ length }, () => 0);

const zeroWeights = () => ({
    w1: Array.from({ length: 16 }, () => zeros(HIDDEN_UNITS)),
    b1: zeros(HIDDEN_UNITS),
    w2: Array.from({ length: HIDDEN_UNITS }, () => zeros(OUTPUT_UNITS)),
    b2: zeros(OUTPUT_UNITS),
});

describe("ml/modelWeights", () => {
    it("parses two's-complement hex words", () => {
        expect(
            parseHexWords("ffc0\n0040\n// comment\n\n7fff\r\n8000\n3c00")
        ).toEqual([-64, 64, 32767, -32768, 15360]);
    });

    it("rejects a malformed hex line with its location", () => {
        try {
            parseHexWords("0001\nxyz\n", "w1.hex");
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ModelWeightsError);
            if (error instanceof ModelWeightsError) {
                expect(error.context).toEqual({
                    source: "w1.hex",
                    line: 2,
                    content: "xyz",
                });
            }
        }
    });

    it("validates layer shapes", () => {
        const weights = zeroWeights();
        expect(() => createModelWeights(weights)).not.toThrow();
        expect(() =>
            createModelWeights({ ...weights, b2: zeros(5) })
        ).toThrow(ModelWeightsError);
        expect(() =>
            createModelWeights({ ...weights, b1: [...zeros(7), 40000] })
        ).toThrow(ModelWeightsError);
    });

    it("freezes the weights it returns", () => {
        const weights = createModelWeights(zeroWeights());
        expect(Object.isFrozen(weights)).toBe(true);
        expect(Object.isFrozen(weights.w1[0])).toBe(true);
    });

    it("loads the bundled model", () => {
        const weights = loadModelWeights(defaultModelDir);
        expect(weights.w1).toHaveLength(16);
        expect(weights.w1[0]).toEqual([-64, 64, 0, 0, 0, 0, 0, 0]);
        expect(weights.w1[6]).toEqual([0, 0, 0, 128, 0, 0, 0, -64]);
        expect(weights.b1).toEqual([
            15360, -17408, -8192, -2048, -11264, 5120, -3072, 4096,
        ]);
        expect(weights.w2[7]).toEqual([256, 0, 0, 0, 0, 0]);
        expect(weights.b2).toEqual([0, 0, 0, 0, 0, 0]);
    });

    it("fails with context when a weight file is missing", () => {
        expect(() => loadModelWeights("/nonexistent/model")).toThrow(
            /Cannot read weight file w1.hex/
        );
    });
});
