import {describe, expect, it} from "vitest";

import {
    accumulate,
    elevenPointAP,
    everyPointAP,
    interpolated101AP,
    mean,
    precisionEnvelope,
    recallLevels,
} from "../precision-recall";

describe("precision-recall", () => {
    describe("accumulate", () => {
        it("builds cumulative precision and recall", () => {
            const counts = accumulate([true, false, true], 4);
            expect(counts.precision).toEqual([1, 0.5, 2 / 3]);
            expect(counts.recall).toEqual([0.25, 0.25, 0.5]);
            expect(counts.truePositives).toBe(2);
            expect(counts.falsePositives).toBe(1);
        });

        it("returns empty curves for no detections", () => {
            expect(accumulate([], 3)).toEqual({ precision: [], recall: [], truePositives: 0, falsePositives: 0 });
        });

        it("never lowers recall while walking down the ranking", () => {
            const flags = [true, false, false, true, true, false, true, false, false, false, true];
            const { recall } = accumulate(flags, 8);
            for (let i = 1; i < recall.length; i++) {
                expect(recall[i]).toBeGreaterThanOrEqual(recall[i - 1]);
            }
            expect(recall[recall.length - 1]).toBe(5 / 8);
        });
    });

    describe("precisionEnvelope", () => {
        it("replaces each value by the max of itself and what follows", () => {
            expect(precisionEnvelope([0.5, 1, 0.4, 0.6])).toEqual([1, 1, 0.6, 0.6]);
            expect(precisionEnvelope([])).toEqual([]);
        });
    });

    describe("everyPointAP", () => {
        it("integrates the enveloped curve over recall", () => {
            const result = everyPointAP([0.25, 0.25, 0.5], [1, 0.5, 2 / 3]);
            expect(result.ap).toBeCloseTo(0.25 + 0.25 * (2 / 3), 12);
            expect(result.recall).toEqual([0, 0.25, 0.25, 0.5]);
            expect(result.precision).toEqual([1, 1, 2 / 3, 2 / 3]);
        });

        it("is 1 for a perfect curve and 0 for an empty one", () => {
            expect(everyPointAP([1], [1]).ap).toBe(1);
            expect(everyPointAP([], []).ap).toBe(0);
            expect(everyPointAP([0], [0]).ap).toBe(0);
        });

        it("stops counting where recall stops", () => {
            expect(everyPointAP([0.5], [1]).ap).toBe(0.5);
        });
    });

    describe("elevenPointAP", () => {
        it("samples eleven recall levels", () => {
            const result = elevenPointAP([0.5], [1]);
            expect(result.recall).toHaveLength(11);
            expect(result.ap).toBeCloseTo(6 / 11, 12);
        });
    });

    describe("interpolated101AP", () => {
        it("samples 101 recall levels", () => {
            expect(recallLevels(101)[1]).toBe(0.01);
            expect(recallLevels(101)[100]).toBe(1);
            const result = interpolated101AP([0.5], [1]);
            expect(result.precision).toHaveLength(101);
            expect(result.precision[50]).toBe(1);
            expect(result.precision[51]).toBe(0);
            expect(result.ap).toBeCloseTo(51 / 101, 12);
        });

        it("uses the best precision at or beyond each level", () => {
            // FP then TP: precision 0 at recall 0, 0.5 at recall 1
            expect(interpolated101AP([0, 1], [0, 0.5]).ap).toBeCloseTo(0.5, 12);
        });
    });

    describe("mean", () => {
        it("is NaN for no values", () => {
            expect(mean([])).toBeNaN();
            expect(mean([1, 2, 3])).toBe(2);
        });
    });
});
