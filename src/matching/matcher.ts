import {assertBoxKind, BoundingBox} from "../annotations/bounding-box";
import {BoundingBoxKind} from "../types/bounding-box-kind.enum";
import {MatchingStrategy} from "../types/matching-strategy.enum";
import type {ImageId} from "../types/bounding-box.types";
import {iou} from "../utils/geometry";

export type MatchRecord = {
    detection: BoundingBox;
    imageId: ImageId;
    confidence: number;
    truePositive: boolean;
    /** IoU with the matched box; for a false positive, the best IoU that was considered (0 if none). */
    iou: number;
    /** Index of the matched box in its image group, or -1. */
    groundTruthIndex: number;
    /** Matched an ignored ground-truth box (COCO size buckets). */
    ignored: boolean;
};

export type ClassMatchResult = {
    classLabel: string;
    /** Confidence-descending across all images, input order on ties. */
    matches: MatchRecord[];
    totalGroundTruth: number;
};

export type MatchOptions = {
    iouThreshold: number;
    strategy?: MatchingStrategy;
    /** Keep only the top-N detections of each (image, class) group. */
    maxDetections?: number;
    classes?: readonly string[];
};

export type ImageMatchOptions = {
    iouThreshold: number;
    strategy?: MatchingStrategy;
    /** Parallel to the ground truth; ignored boxes are only a fallback and do not count as positives. */
    ignoredGroundTruth?: readonly boolean[];
};

export type ImageClassGroup = { groundTruths: BoundingBox[]; detections: BoundingBox[] };

/** classLabel -> imageId -> boxes, classes and images in first-seen order. */
export type GroupedBoxes = Map<string, Map<ImageId, ImageClassGroup>>;

export function groupByClassAndImage(
    groundTruths: readonly BoundingBox[],
    detections: readonly BoundingBox[],
    classes?: readonly string[],
): GroupedBoxes {
    const wanted = classes ? new Set(classes) : null;
    const groups: GroupedBoxes = new Map();
    const slot = (b: BoundingBox): ImageClassGroup | null => {
        if (wanted && !wanted.has(b.classLabel)) return null;
        let byImage = groups.get(b.classLabel);
        if (!byImage) {
            byImage = new Map();
            groups.set(b.classLabel, byImage);
        }
        let group = byImage.get(b.imageId);
        if (!group) {
            group = { groundTruths: [], detections: [] };
            byImage.set(b.imageId, group);
        }
        return group;
    };
    for (const g of groundTruths) slot(g)?.groundTruths.push(g);
    for (const d of detections) slot(d)?.detections.push(d);
    return groups;
}

/** Stable: equal confidences keep their input order. */
export function sortByConfidence(detections: readonly BoundingBox[]): BoundingBox[] {
    return [...detections].sort((a, b) => b.score - a.score);
}

function bestCandidate(
    ious: readonly number[],
    accept: (j: number) => boolean,
): { index: number; iou: number } {
    let index = -1;
    let best = -1;
    for (let j = 0; j < ious.length; j++) {
        if (!accept(j)) continue;
        if (ious[j] > best) {
            best = ious[j];
            index = j;
        }
    }
    return { index, iou: Math.max(best, 0) };
}

/**
 * Matches the detections of one image and class, already sorted by
 * confidence, against that image's ground truth. Returns one record per
 * detection in the given order.
 */
export function matchImage(
    groundTruths: readonly BoundingBox[],
    sortedDetections: readonly BoundingBox[],
    options: ImageMatchOptions,
): MatchRecord[] {
    const { iouThreshold } = options;
    const strategy = options.strategy ?? MatchingStrategy.GREEDY;
    const ignored = options.ignoredGroundTruth;
    const matched = groundTruths.map(() => false);

    return sortedDetections.map((det) => {
        const ious = groundTruths.map((g) => iou(det.box, g.box));
        let pick: { index: number; iou: number };
        let truePositive = false;

        if (strategy === MatchingStrategy.PASCAL_VOC) {
            pick = bestCandidate(ious, () => true);
            truePositive = pick.index >= 0 && pick.iou >= iouThreshold && !matched[pick.index];
        } else {
            pick = bestCandidate(ious, (j) => !matched[j] && !ignored?.[j]);
            if (pick.index < 0 || pick.iou < iouThreshold) {
                // Fall back to ignored boxes only when no regular box qualifies.
                const fallback = ignored ? bestCandidate(ious, (j) => !matched[j] && ignored[j]) : null;
                if (fallback && fallback.index >= 0 && fallback.iou >= iouThreshold) pick = fallback;
            }
            truePositive = pick.index >= 0 && pick.iou >= iouThreshold;
        }

        if (truePositive) matched[pick.index] = true;
        return {
            detection: det,
            imageId: det.imageId,
            confidence: det.score,
            truePositive,
            iou: pick.iou,
            groundTruthIndex: truePositive ? pick.index : -1,
            ignored: truePositive && !!ignored?.[pick.index],
        };
    });
}

/**
 * Per-class matching over all images. Detections of a class are ranked
 * globally, matched image by image, and returned in rank order. Throws
 * InvalidInputError when either list holds boxes of the wrong kind.
 */
export function matchDetections(
    groundTruths: readonly BoundingBox[],
    detections: readonly BoundingBox[],
    options: MatchOptions,
): ClassMatchResult[] {
    assertBoxKind(groundTruths, BoundingBoxKind.GROUND_TRUTH, 'groundTruths');
    assertBoxKind(detections, BoundingBoxKind.DETECTED, 'detections');
    const groups = groupByClassAndImage(groundTruths, detections, options.classes);
    const inputOrder = new Map<BoundingBox, number>();
    detections.forEach((d, i) => { if (!inputOrder.has(d)) inputOrder.set(d, i); });
    const results: ClassMatchResult[] = [];

    for (const classLabel of [...groups.keys()].sort()) {
        const byImage = groups.get(classLabel) ?? new Map<ImageId, ImageClassGroup>();
        const ranked: Array<{ record: MatchRecord; rank: number }> = [];
        let totalGroundTruth = 0;

        for (const group of byImage.values()) {
            totalGroundTruth += group.groundTruths.length;
            const sorted = sortByConfidence(group.detections).slice(0, options.maxDetections);
            const records = matchImage(group.groundTruths, sorted, options);
            records.forEach((record) => ranked.push({ record, rank: inputOrder.get(record.detection) ?? 0 }));
        }

        ranked.sort((a, b) => b.record.confidence - a.record.confidence || a.rank - b.rank);
        results.push({ classLabel, matches: ranked.map((r) => r.record), totalGroundTruth });
    }
    return results;
}
