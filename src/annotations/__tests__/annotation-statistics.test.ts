import {describe, expect, it} from "vitest";

import {BoundingBox} from "../bounding-box";
import {computeAnnotationStatistics, sizeBucket} from "../annotation-statistics";

describe("sizeBucket", () => {
    it("uses half-open COCO ranges", () => {
        expect(sizeBucket(1023)).toBe("small");
        expect(sizeBucket(1024)).toBe("medium");
        expect(sizeBucket(9215)).toBe("medium");
        expect(sizeBucket(9216)).toBe("large");
    });
});

describe("computeAnnotationStatistics", () => {
    it("counts boxes by class, image and size", () => {
        const stats = computeAnnotationStatistics([
            BoundingBox.groundTruth("img1", "cat", [0, 0, 10, 10]),
            BoundingBox.groundTruth("img1", "cat", [0, 0, 40, 40]),
            BoundingBox.groundTruth("img2", "dog", [0, 0, 100, 100]),
        ]);

        expect(stats.totalBoxes).toBe(3);
        expect(stats.images).toBe(2);
        expect(stats.classes).toEqual(["cat", "dog"]);
        expect(stats.perClass.cat).toEqual({
            boxes: 2,
            images: 1,
            sizes: { small: 1, medium: 1, large: 0 },
            meanArea: 850,
        });
        expect(stats.perClass.dog.sizes).toEqual({ small: 0, medium: 0, large: 1 });
        expect([...stats.perImage]).toEqual([["img1", 2], ["img2", 1]]);
    });

    it("handles an empty collection", () => {
        const stats = computeAnnotationStatistics([]);
        expect(stats.totalBoxes).toBe(0);
        expect(stats.images).toBe(0);
        expect(stats.classes).toEqual([]);
    });

    it("counts labels that name Object.prototype members", () => {
        const stats = computeAnnotationStatistics([
            BoundingBox.groundTruth("img1", "constructor", [0, 0, 10, 10]),
            BoundingBox.groundTruth("img1", "__proto__", [0, 0, 40, 40]),
            BoundingBox.groundTruth("img2", "toString", [0, 0, 100, 100]),
        ]);

        expect(stats.classes).toEqual(["__proto__", "constructor", "toString"]);
        expect(Object.entries(stats.perClass).map(([label, c]) => [label, c.boxes, c.sizes])).toEqual([
            ["constructor", 1, { small: 1, medium: 0, large: 0 }],
            ["__proto__", 1, { small: 0, medium: 1, large: 0 }],
            ["toString", 1, { small: 0, medium: 0, large: 1 }],
        ]);
    });
});
