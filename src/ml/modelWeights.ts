// src/ml/modelWeights.ts
import { readFileSync } from "fs";
import { join } from "path";
import { z } from "zod";
import { ModelWeightsError } from "../core/errors.js";
import { FEATURE_COUNT } from "../indicators/featureExtractor.js";
import { ML_CLASSES } from "../types/alertTypes.js";

export const HIDDEN_UNITS = 8;
export const OUTPUT_UNITS = ML_CLASSES.length;

/**
 * Quantized two-layer classifier, immutable once loaded.
 *
 * `w1[input][hidden]`, `w2[hidden][output]`, all signed 16-bit.
 */
export interface ModelWeights {
    readonly w1: readonly (readonly number[])[];
    readonly b1: readonly number[];
    readonly w2: readonly (readonly number[])[];
    readonly b2: readonly number[];
}

const Int16 = z.number().int().min(-32768).max(32767);
const row = (length: number) => z.array(Int16).length(length);

export const ModelWeightsSchema = z.object({
    w1: z.array(row(HIDDEN_UNITS)).length(FEATURE_COUNT),
    b1: row(HIDDEN_UNITS),
    w2: z.array(row(OUTPUT_UNITS)).length(HIDDEN_UNITS),
    b2: row(OUTPUT_UNITS),
});

/**
 * Validate and freeze a weight set.
 */
export function createModelWeights(raw: unknown): ModelWeights {
    const parsed = ModelWeightsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ModelWeightsError("Model weights failed validation", {
            issues: parsed.error.errors.map(
                (issue) => `${issue.path.join(".")}: ${issue.message}`
            ),
        });
    }
    const freezeRows = (rows: number[][]) =>
        Object.freeze(rows.map((values) => Object.freeze(values)));
    return Object.freeze({
        w1: freezeRows(parsed.data.w1),
        b1: Object.freeze(parsed.data.b1),
        w2: freezeRows(parsed.data.w2),
        b2: Object.freeze(parsed.data.b2),
    });
}

/**
 * Parse a ROM image: one 4-digit two's-complement hex value per line.
 * Blank lines and `//` comments are skipped.
 */
export function parseHexWords(text: string, source = "<inline>"): number[] {
    const values: number[] = [];
    text.split(/\r?\n/).forEach((line, index) => {
        const content = line.replace(/\/\/.*$/, "").trim();
        if (content.length === 0) return;
        if (!/^[0-9a-fA-F]{1,4}$/.test(content)) {
            throw new ModelWeightsError(`Malformed hex word in ${source}`, {
                source,
                line: index + 1,
                content,
            });
        }
        const unsigned = Number.parseInt(content, 16);
        values.push(unsigned >= 0x8000 ? unsigned - 0x10000 : unsigned);
    });
    return values;
}

const chunk = (values: readonly number[], width: number): number[][] => {
    const rows: number[][] = [];
    for (let i = 0; i < values.length; i += width) {
        rows.push(values.slice(i, i + width));
    }
    return rows;
};

const readHexFile = (directory: string, name: string): number[] => {
    const path = join(directory, name);
    let text: string;
    try {
        text = readFileSync(path, "utf-8");
    } catch (error) {
        throw new ModelWeightsError(
            `Cannot read weight file ${name}`,
            { path },
            error instanceof Error ? error : undefined
        );
    }
    return parseHexWords(text, path);
};

/**
 * Load `w1.hex`, `b1.hex`, `w2.hex` and `b2.hex` from a model directory.
 * W1 is stored row-major by input, W2 row-major by hidden unit.
 */
export function loadModelWeights(directory: string): ModelWeights {
    return createModelWeights({
        w1: chunk(readHexFile(directory, "w1.hex"), HIDDEN_UNITS),
        b1: readHexFile(directory, "b1.hex"),
        w2: chunk(readHexFile(directory, "w2.hex"), OUTPUT_UNITS),
        b2: readHexFile(directory, "b2.hex"),
    });
}
