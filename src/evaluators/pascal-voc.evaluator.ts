import {BoundingBox} from "../annotations/bounding-box";
import {InterpolationMethod} from "../types/interpolation-method.enum";
import {MatchingStrategy} from "../types/matching-strategy.enum";
import {matchDetections, type ClassMatchResult} from "../matching/matcher";
import {accumulate, elevenPointAP, everyPointAP, mean} from "../utils/precision-recall";
import type {PascalClassMetrics, PascalVocResult} from "../interfaces/evaluation-result";

export type PascalVocOptions = {
    iouThreshold?: number;
    method?: InterpolationMethod;
    strategy?: MatchingStrategy;
    classes?: readonly string[];
};

export const DEFAULT_PASCAL_IOU_THRESHOLD = 0.5;

/** AP of one class from its ranked matches; null when the class has no ground truth. */
export function computeClassAP(
    result: ClassMatchResult,
    iouThreshold: number,
    method: InterpolationMethod = InterpolationMethod.EVERY_POINT,
): PascalClassMetrics | null {
    if (result.totalGroundTruth === 0) return null;

    const counts = accumulate(result.matches.map((m) => m.truePositive), result.totalGroundTruth);
    const interpolated = method === InterpolationMethod.ELEVEN_POINT
        ? elevenPointAP(counts.recall, counts.precision)
        : everyPointAP(counts.recall, counts.precision);

    return {
        classLabel: result.classLabel,
        precision: counts.precision,
        recall: counts.recall,
        ap: interpolated.ap,
        interpolatedPrecision: interpolated.precision,
        interpolatedRecall: interpolated.recall,
        totalPositives: result.totalGroundTruth,
        truePositives: counts.truePositives,
        falsePositives: counts.falsePositives,
        iouThreshold,
        method,
    };
}

/**
 * Pascal VOC metrics at one IoU threshold. Only classes with ground truth are
 * reported and averaged; detections of other classes are ignored.
 */
export function evaluatePascalVoc(
    groundTruths: readonly BoundingBox[],
    detections: readonly BoundingBox[],
    options: PascalVocOptions = {},
): PascalVocResult {
    const iouThreshold = options.iouThreshold ?? DEFAULT_PASCAL_IOU_THRESHOLD;
    const method = options.method ?? InterpolationMethod.EVERY_POINT;

    const perClass = new Map<string, PascalClassMetrics>();
    const matches = matchDetections(groundTruths, detections, {
        iouThreshold,
        strategy: options.strategy,
        classes: options.classes,
    });
    for (const result of matches) {
        const metrics = computeClassAP(result, iouThreshold, method);
        if (metrics) perClass.set(result.classLabel, metrics);
    }

    return {
        mAP: mean([...perClass.values()].map((m) => m.ap)),
        // defines own keys, so labels like "__proto__" survive
        perClass: Object.fromEntries(perClass),
    };
}
