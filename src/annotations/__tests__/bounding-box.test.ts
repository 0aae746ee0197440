import {describe, expect, it} from "vitest";

import {asGroundTruth, BoundingBox, replaceIdsWithClasses} from "../bounding-box";
import {AnnotationFormat} from "../../types/annotation-format.enum";
import {BoundingBoxKind} from "../../types/bounding-box-kind.enum";
import {InvalidInputError} from "../../utils/errors";

describe("BoundingBox", () => {
    describe("create", () => {
        it("keeps absolute x1/y1/x2/y2 coordinates", () => {
            const b = BoundingBox.groundTruth("img", "cat", [10, 20, 40, 60]);
            expect(b.box).toEqual({ x1: 10, y1: 20, x2: 40, y2: 60 });
            expect(b.area).toBe(1200);
            expect(b.width).toBe(30);
            expect(b.height).toBe(40);
            expect(b.kind).toBe(BoundingBoxKind.GROUND_TRUTH);
        });

        it("converts x/y/width/height", () => {
            const b = BoundingBox.create({
                imageId: 1,
                classLabel: "cat",
                kind: BoundingBoxKind.DETECTED,
                coordinates: [10, 20, 30, 40],
                format: AnnotationFormat.XYWH_ABSOLUTE,
                confidence: 0.5,
            });
            expect(b.box).toEqual({ x1: 10, y1: 20, x2: 40, y2: 60 });
        });

        it("converts relative center coordinates with the image size", () => {
            const b = BoundingBox.create({
                imageId: "img",
                classLabel: "dog",
                kind: BoundingBoxKind.GROUND_TRUTH,
                coordinates: [0.5, 0.5, 0.4, 0.6],
                format: AnnotationFormat.YOLO_RELATIVE,
                imageSize: { width: 640, height: 480 },
            });
            expect(b.box.x1).toBeCloseTo(192, 9);
            expect(b.box.y1).toBeCloseTo(96, 9);
            expect(b.box.x2).toBeCloseTo(448, 9);
            expect(b.box.y2).toBeCloseTo(384, 9);
        });

        it("requires the image size for relative coordinates", () => {
            expect(() => BoundingBox.create({
                imageId: "img",
                classLabel: "dog",
                kind: BoundingBoxKind.GROUND_TRUTH,
                coordinates: [0.5, 0.5, 0.4, 0.6],
                format: AnnotationFormat.YOLO_RELATIVE,
            })).toThrow("imageSize: relative coordinates need the image size");
        });

        it("rejects non-finite coordinates", () => {
            expect(() => BoundingBox.groundTruth("img", "cat", [0, 0, NaN, 10])).toThrow(InvalidInputError);
            expect(() => BoundingBox.groundTruth("img", "cat", [0, 0, Infinity, 10])).toThrow(InvalidInputError);
        });

        it("rejects detections without a valid confidence", () => {
            expect(() => BoundingBox.create({
                imageId: "img",
                classLabel: "cat",
                kind: BoundingBoxKind.DETECTED,
                coordinates: [0, 0, 10, 10],
            })).toThrow("confidence: detections need a confidence");
            expect(() => BoundingBox.detected("img", "cat", [0, 0, 10, 10], 1.5)).toThrow(InvalidInputError);
        });

        it("rejects rectangles inverted beyond the tolerance", () => {
            expect(() => BoundingBox.groundTruth("img", "cat", [10, 10, 5, 20])).toThrow(
                "Invalid bounding box: coordinates: inverted rectangle (10, 10, 5, 20) in image img",
            );
        });

        it("accepts degenerate boxes with zero area", () => {
            expect(BoundingBox.groundTruth("img", "cat", [5, 5, 5, 5]).area).toBe(0);
            expect(BoundingBox.groundTruth("img", "cat", [10, 10, 10 - 1e-7, 20]).area).toBe(0);
        });

        it("drops the confidence of ground truth", () => {
            const b = BoundingBox.create({
                imageId: "img",
                classLabel: "cat",
                kind: BoundingBoxKind.GROUND_TRUTH,
                coordinates: [0, 0, 10, 10],
                confidence: 0.7,
            });
            expect(b.confidence).toBeUndefined();
            expect(b.score).toBe(0);
        });
    });

    it("is frozen", () => {
        const b = BoundingBox.detected("img", "cat", [0, 0, 10, 10], 0.9);
        expect(Object.isFrozen(b)).toBe(true);
        expect(Object.isFrozen(b.box)).toBe(true);
    });

    describe("withKind", () => {
        it("returns a new box and leaves the original alone", () => {
            const det = BoundingBox.detected("img", "cat", [0, 0, 10, 10], 0.9);
            const gt = det.withKind(BoundingBoxKind.GROUND_TRUTH);
            expect(gt).not.toBe(det);
            expect(gt.kind).toBe(BoundingBoxKind.GROUND_TRUTH);
            expect(gt.confidence).toBeUndefined();
            expect(det.kind).toBe(BoundingBoxKind.DETECTED);
            expect(det.confidence).toBe(0.9);
        });

        it("needs a confidence to turn ground truth into a detection", () => {
            const gt = BoundingBox.groundTruth("img", "cat", [0, 0, 10, 10]);
            expect(() => gt.withKind(BoundingBoxKind.DETECTED)).toThrow(InvalidInputError);
            expect(gt.withKind(BoundingBoxKind.DETECTED, 0.3).confidence).toBe(0.3);
        });
    });

    it("compares structurally", () => {
        const a = BoundingBox.detected("img", "cat", [0, 0, 10, 10], 0.9);
        expect(a.equals(BoundingBox.detected("img", "cat", [0, 0, 10, 10], 0.9))).toBe(true);
        expect(a.equals(BoundingBox.detected("img", "cat", [0, 0, 10, 10], 0.8))).toBe(false);
        expect(a.equals(BoundingBox.detected(1, "cat", [0, 0, 10, 10], 0.9))).toBe(false);
    });
});

describe("asGroundTruth", () => {
    it("re-tags copies without mutating the input", () => {
        const dets = [
            BoundingBox.detected("a", "cat", [0, 0, 10, 10], 0.9),
            BoundingBox.detected("b", "dog", [5, 5, 10, 10], 0.4),
        ];
        const gts = asGroundTruth(dets);
        expect(gts.map((b) => b.kind)).toEqual([BoundingBoxKind.GROUND_TRUTH, BoundingBoxKind.GROUND_TRUTH]);
        expect(dets.map((b) => b.kind)).toEqual([BoundingBoxKind.DETECTED, BoundingBoxKind.DETECTED]);
        expect(gts[1].box).toEqual(dets[1].box);
    });
});

describe("replaceIdsWithClasses", () => {
    it("maps numeric ids to names and keeps unknown ids", () => {
        const boxes = ["0", "1", "7", "cat"].map((label) => BoundingBox.groundTruth("img", label, [0, 0, 1, 1]));
        expect(replaceIdsWithClasses(boxes, ["person", "car"]).map((b) => b.classLabel)).toEqual(["person", "car", "7", "cat"]);
    });
});
