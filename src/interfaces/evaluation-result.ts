import type {InterpolationMethod} from "../types/interpolation-method.enum";
import type {MatchingStrategy} from "../types/matching-strategy.enum";
import type {CocoMetric, MetricSelection} from "../types/metric-selection.enum";

export interface PascalClassMetrics {
    classLabel: string;
    precision: number[];            // cumulative, one entry per ranked detection
    recall: number[];
    ap: number;
    interpolatedPrecision: number[];
    interpolatedRecall: number[];
    totalPositives: number;         // ground-truth boxes of the class
    truePositives: number;
    falsePositives: number;
    iouThreshold: number;
    method: InterpolationMethod;
}

export interface PascalVocResult {
    mAP: number;                    // NaN when no class has ground truth
    perClass: Record<string, PascalClassMetrics>;
}

/** The twelve COCO summary values; NaN where no class contributes. */
export type CocoSummary = Record<CocoMetric, number>;

/** Everything a chart needs for one class. */
export interface PrecisionRecallCurve {
    classLabel: string;
    precision: number[];
    recall: number[];
    ap: number;
    iouThreshold: number;
}

export interface EvaluationReport {
    config: {
        iouThreshold: number;
        interpolation: InterpolationMethod;
        matchingStrategy: MatchingStrategy;
        metrics: MetricSelection[];
        classes?: string[];
    };
    input: {
        images: number;
        groundTruths: number;
        detections: number;
        classes: string[];          // every label seen in either list
    };
    coco?: Partial<CocoSummary>;
    pascal?: {
        mAP?: number;
        perClass?: Record<string, PascalClassMetrics>;
    };
    curves: PrecisionRecallCurve[];
}
