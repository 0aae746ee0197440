export {BoundingBox, asGroundTruth, assertBoxKind, replaceIdsWithClasses, INVERSION_TOLERANCE} from "./annotations/bounding-box";
export {computeAnnotationStatistics, sizeBucket} from "./annotations/annotation-statistics";
export type {AnnotationStatistics, ClassStatistics} from "./annotations/annotation-statistics";

export {area, intersect, intersectionArea, iou, iouMatrix} from "./utils/geometry";
export {accumulate, everyPointAP, elevenPointAP, interpolated101AP, precisionEnvelope, recallLevels, mean} from "./utils/precision-recall";
export type {CumulativeCounts, InterpolatedAP} from "./utils/precision-recall";
export {InvalidInputError} from "./utils/errors";
export {
    buildPrecisionRecallSvg,
    drawPrecisionRecallCurve,
    drawPrecisionRecallCurves,
    chartFileNames,
    colorForLabel,
    formatPercent,
    toPolylinePoints,
} from "./utils/draw-pr-curves";
export type {CurveChartOptions, PlotArea} from "./utils/draw-pr-curves";

export {matchDetections, matchImage, groupByClassAndImage, sortByConfidence} from "./matching/matcher";
export type {MatchRecord, ClassMatchResult, MatchOptions, ImageMatchOptions, ImageClassGroup, GroupedBoxes} from "./matching/matcher";

export {evaluatePascalVoc, computeClassAP, DEFAULT_PASCAL_IOU_THRESHOLD} from "./evaluators/pascal-voc.evaluator";
export type {PascalVocOptions} from "./evaluators/pascal-voc.evaluator";
export {
    CocoEvaluator,
    getCocoSummary,
    COCO_IOU_THRESHOLDS,
    COCO_AREA_RANGES,
    COCO_MAX_DETECTIONS,
    evaluateImageGroup,
    inAreaRange,
} from "./evaluators/coco.evaluator";
export type {CocoSetting, CocoClassResult, AreaRange} from "./evaluators/coco.evaluator";

export {MetricsAnalyzer} from "./analysis/metrics-analyzer";
export {buildConfig, DEFAULT_EVALUATION_CONFIG} from "./analysis/evaluation-config";
export type {EvaluationConfig, EvaluationOptions} from "./analysis/evaluation-config";

export {BoundingBoxKind} from "./types/bounding-box-kind.enum";
export {AnnotationFormat} from "./types/annotation-format.enum";
export {MetricSelection, COCO_METRICS, PASCAL_METRICS, ALL_METRICS, isCocoMetric} from "./types/metric-selection.enum";
export type {CocoMetric} from "./types/metric-selection.enum";
export {InterpolationMethod} from "./types/interpolation-method.enum";
export {MatchingStrategy} from "./types/matching-strategy.enum";
export type {BoxCoordinates, BoundingBoxInit, ImageId, ImageSize, SizeBucket} from "./types/bounding-box.types";
export type {
    EvaluationReport,
    PascalClassMetrics,
    PascalVocResult,
    CocoSummary,
    PrecisionRecallCurve,
} from "./interfaces/evaluation-result";
