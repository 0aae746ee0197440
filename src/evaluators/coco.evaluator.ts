import {assertBoxKind, BoundingBox} from "../annotations/bounding-box";
import {BoundingBoxKind} from "../types/bounding-box-kind.enum";
import {groupByClassAndImage, matchImage, sortByConfidence, type GroupedBoxes, type ImageClassGroup, type MatchRecord} from "../matching/matcher";
import {MatchingStrategy} from "../types/matching-strategy.enum";
import {COCO_METRICS, MetricSelection, type CocoMetric} from "../types/metric-selection.enum";
import type {ImageId, SizeBucket} from "../types/bounding-box.types";
import type {CocoSummary} from "../interfaces/evaluation-result";
import {accumulate, interpolated101AP, mean} from "../utils/precision-recall";

/** Half-open [min, max) area interval. */
export type AreaRange = readonly [number, number];

export const COCO_IOU_THRESHOLDS: readonly number[] = Array.from({ length: 10 }, (_, i) => (50 + 5 * i) / 100);

export const COCO_AREA_RANGES: Readonly<Record<'all' | SizeBucket, AreaRange>> = {
    all: [0, Infinity],
    small: [0, 32 ** 2],
    medium: [32 ** 2, 96 ** 2],
    large: [96 ** 2, Infinity],
};

export const COCO_MAX_DETECTIONS = [1, 10, 100] as const;

export type CocoSetting = {
    iouThreshold: number;
    maxDetections: number;
    areaRange: AreaRange;
};

export type CocoClassResult = {
    classLabel: string;
    /** null when the class has no ground truth inside the area range. */
    ap: number | null;
    /** Highest recall reached; null like `ap`. */
    recall: number | null;
    totalPositives: number;
    truePositives: number;
    falsePositives: number;
    precisionCurve: number[];
    recallCurve: number[];
    interpolatedPrecision: number[];
    interpolatedRecall: number[];
};

type Recipe = {
    value: 'ap' | 'recall';
    thresholds: readonly number[];
    maxDetections: number;
    areaRange: AreaRange;
};

const ALL = COCO_AREA_RANGES.all;
const [MAX_DETS_STRICT, MAX_DETS_MID, MAX_DETS_DEFAULT] = COCO_MAX_DETECTIONS;

const RECIPES: Readonly<Record<CocoMetric, Recipe>> = {
    [MetricSelection.AP]: { value: 'ap', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_DEFAULT, areaRange: ALL },
    [MetricSelection.AP50]: { value: 'ap', thresholds: [0.5], maxDetections: MAX_DETS_DEFAULT, areaRange: ALL },
    [MetricSelection.AP75]: { value: 'ap', thresholds: [0.75], maxDetections: MAX_DETS_DEFAULT, areaRange: ALL },
    [MetricSelection.AP_SMALL]: { value: 'ap', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_DEFAULT, areaRange: COCO_AREA_RANGES.small },
    [MetricSelection.AP_MEDIUM]: { value: 'ap', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_DEFAULT, areaRange: COCO_AREA_RANGES.medium },
    [MetricSelection.AP_LARGE]: { value: 'ap', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_DEFAULT, areaRange: COCO_AREA_RANGES.large },
    [MetricSelection.AR1]: { value: 'recall', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_STRICT, areaRange: ALL },
    [MetricSelection.AR10]: { value: 'recall', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_MID, areaRange: ALL },
    [MetricSelection.AR100]: { value: 'recall', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_DEFAULT, areaRange: ALL },
    [MetricSelection.AR_SMALL]: { value: 'recall', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_DEFAULT, areaRange: COCO_AREA_RANGES.small },
    [MetricSelection.AR_MEDIUM]: { value: 'recall', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_DEFAULT, areaRange: COCO_AREA_RANGES.medium },
    [MetricSelection.AR_LARGE]: { value: 'recall', thresholds: COCO_IOU_THRESHOLDS, maxDetections: MAX_DETS_DEFAULT, areaRange: COCO_AREA_RANGES.large },
};

export function inAreaRange(area: number, range: AreaRange): boolean {
    return range[0] <= area && area < range[1];
}

/**
 * Matches one (image, class) group under a COCO setting. Ground truth outside
 * the area range is ignored; a detection is dropped when it matched ignored
 * ground truth, or matched nothing and lies outside the range itself.
 */
export function evaluateImageGroup(group: ImageClassGroup, setting: CocoSetting): { records: MatchRecord[]; positives: number } {
    const detections = sortByConfidence(group.detections).slice(0, setting.maxDetections);
    const ignored = group.groundTruths.map((g) => !inAreaRange(g.area, setting.areaRange));
    const records = matchImage(group.groundTruths, detections, {
        iouThreshold: setting.iouThreshold,
        strategy: MatchingStrategy.GREEDY,
        ignoredGroundTruth: ignored,
    }).filter((r) => (r.truePositive ? !r.ignored : inAreaRange(r.detection.area, setting.areaRange)));
    return { records, positives: ignored.filter((i) => !i).length };
}

/**
 * COCO-style evaluation over one set of boxes. Each (threshold, max
 * detections, area range) setting is computed once and shared by every
 * metric that needs it.
 */
export class CocoEvaluator {
    private readonly groups: GroupedBoxes;
    private readonly inputOrder = new Map<BoundingBox, number>();
    private readonly cache = new Map<string, CocoClassResult[]>();

    constructor(
        groundTruths: readonly BoundingBox[],
        detections: readonly BoundingBox[],
        classes?: readonly string[],
    ) {
        assertBoxKind(groundTruths, BoundingBoxKind.GROUND_TRUTH, 'groundTruths');
        assertBoxKind(detections, BoundingBoxKind.DETECTED, 'detections');
        this.groups = groupByClassAndImage(groundTruths, detections, classes);
        detections.forEach((d, i) => { if (!this.inputOrder.has(d)) this.inputOrder.set(d, i); });
    }

    /** Per-class results of one setting, classes sorted by label. The caller owns the returned copies. */
    evaluate(setting: CocoSetting): CocoClassResult[] {
        return this.results(setting).map((r) => ({
            ...r,
            precisionCurve: [...r.precisionCurve],
            recallCurve: [...r.recallCurve],
            interpolatedPrecision: [...r.interpolatedPrecision],
            interpolatedRecall: [...r.interpolatedRecall],
        }));
    }

    private results(setting: CocoSetting): readonly CocoClassResult[] {
        const key = `${setting.iouThreshold}|${setting.maxDetections}|${setting.areaRange[0]}|${setting.areaRange[1]}`;
        const cached = this.cache.get(key);
        if (cached) return cached;

        const results: CocoClassResult[] = [];
        for (const classLabel of [...this.groups.keys()].sort()) {
            const byImage = this.groups.get(classLabel) ?? new Map<ImageId, ImageClassGroup>();
            const ranked: Array<{ record: MatchRecord; rank: number }> = [];
            let positives = 0;
            for (const group of byImage.values()) {
                const evaluated = evaluateImageGroup(group, setting);
                positives += evaluated.positives;
                for (const record of evaluated.records) {
                    ranked.push({ record, rank: this.inputOrder.get(record.detection) ?? 0 });
                }
            }
            ranked.sort((a, b) => b.record.confidence - a.record.confidence || a.rank - b.rank);
            results.push(this.classResult(classLabel, ranked.map((r) => r.record.truePositive), positives));
        }
        this.cache.set(key, results);
        return results;
    }

    /** Requested summary fields only; unrequested settings are never evaluated. */
    summarize(metrics: readonly CocoMetric[] = COCO_METRICS): Partial<CocoSummary> {
        const summary: Partial<CocoSummary> = {};
        for (const metric of COCO_METRICS) {
            if (!metrics.includes(metric)) continue;
            const recipe = RECIPES[metric];
            const values: number[] = [];
            for (const iouThreshold of recipe.thresholds) {
                const results = this.results({ iouThreshold, maxDetections: recipe.maxDetections, areaRange: recipe.areaRange });
                for (const r of results) {
                    const v = recipe.value === 'ap' ? r.ap : r.recall;
                    if (v !== null) values.push(v);
                }
            }
            summary[metric] = mean(values);
        }
        return summary;
    }

    private classResult(classLabel: string, flags: boolean[], positives: number): CocoClassResult {
        const counts = accumulate(flags, positives);
        if (positives === 0) {
            return {
                classLabel,
                ap: null,
                recall: null,
                totalPositives: 0,
                truePositives: counts.truePositives,
                falsePositives: counts.falsePositives,
                precisionCurve: counts.precision,
                recallCurve: counts.recall,
                interpolatedPrecision: [],
                interpolatedRecall: [],
            };
        }
        const interpolated = interpolated101AP(counts.recall, counts.precision);
        return {
            classLabel,
            ap: interpolated.ap,
            recall: counts.truePositives / positives,
            totalPositives: positives,
            truePositives: counts.truePositives,
            falsePositives: counts.falsePositives,
            precisionCurve: counts.precision,
            recallCurve: counts.recall,
            interpolatedPrecision: interpolated.precision,
            interpolatedRecall: interpolated.recall,
        };
    }
}

/** The COCO summary (all twelve fields unless `metrics` narrows them). */
export function getCocoSummary(
    groundTruths: readonly BoundingBox[],
    detections: readonly BoundingBox[],
    options: { metrics?: readonly CocoMetric[]; classes?: readonly string[] } = {},
): Partial<CocoSummary> {
    return new CocoEvaluator(groundTruths, detections, options.classes).summarize(options.metrics);
}
