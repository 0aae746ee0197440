import {assertBoxKind, BoundingBox} from "../annotations/bounding-box";
import {BoundingBoxKind} from "../types/bounding-box-kind.enum";
import {isCocoMetric, MetricSelection} from "../types/metric-selection.enum";
import {CocoEvaluator} from "../evaluators/coco.evaluator";
import {evaluatePascalVoc} from "../evaluators/pascal-voc.evaluator";
import type {EvaluationReport, PrecisionRecallCurve} from "../interfaces/evaluation-result";
import {buildConfig, type EvaluationConfig, type EvaluationOptions} from "./evaluation-config";

/**
 * Runs the requested COCO and Pascal VOC metrics over two box collections and
 * shapes them into one report. Metrics that are not requested are not
 * computed.
 */
export class MetricsAnalyzer {
    private readonly config: EvaluationConfig;

    constructor(options: EvaluationOptions = {}) {
        this.config = buildConfig(options);
    }

    log(text: string) {
        if (this.config.debug) {
            console.log(text);
        }
    }

    analyze(
        groundTruths: readonly BoundingBox[],
        detections: readonly BoundingBox[],
        overrides?: EvaluationOptions,
    ): EvaluationReport {
        const config = overrides ? buildConfig({ ...this.config, ...overrides }) : this.config;
        assertBoxKind(groundTruths, BoundingBoxKind.GROUND_TRUTH, 'groundTruths');
        assertBoxKind(detections, BoundingBoxKind.DETECTED, 'detections');

        const images = new Set([...groundTruths, ...detections].map((b) => b.imageId));
        const labels = new Set([...groundTruths, ...detections].map((b) => b.classLabel));
        this.log(`Evaluating ${groundTruths.length} ground-truth and ${detections.length} detected boxes over ${images.size} images, ${labels.size} classes`);

        const report: EvaluationReport = {
            config: {
                iouThreshold: config.iouThreshold,
                interpolation: config.interpolation,
                matchingStrategy: config.matchingStrategy,
                metrics: [...config.metrics],
                classes: config.classes ? [...config.classes] : undefined,
            },
            input: {
                images: images.size,
                groundTruths: groundTruths.length,
                detections: detections.length,
                classes: [...labels].sort(),
            },
            curves: [],
        };

        const cocoMetrics = config.metrics.filter(isCocoMetric);
        if (cocoMetrics.length) {
            const started = performance.now();
            report.coco = new CocoEvaluator(groundTruths, detections, config.classes).summarize(cocoMetrics);
            this.log(`COCO: ${cocoMetrics.join(', ')} in ${(performance.now() - started).toFixed(1)} ms`);
        }

        const wantsPerClass = config.metrics.includes(MetricSelection.PASCAL_AP);
        const wantsMap = config.metrics.includes(MetricSelection.PASCAL_MAP);
        if (wantsPerClass || wantsMap) {
            const pascal = evaluatePascalVoc(groundTruths, detections, {
                iouThreshold: config.iouThreshold,
                method: config.interpolation,
                strategy: config.matchingStrategy,
                classes: config.classes,
            });
            report.pascal = {};
            if (wantsMap) report.pascal.mAP = pascal.mAP;
            if (wantsPerClass) {
                report.pascal.perClass = pascal.perClass;
                report.curves = Object.values(pascal.perClass).map((m): PrecisionRecallCurve => ({
                    classLabel: m.classLabel,
                    precision: m.precision,
                    recall: m.recall,
                    ap: m.ap,
                    iouThreshold: m.iouThreshold,
                }));
            }
            this.log(`Pascal VOC @${config.iouThreshold}: mAP=${pascal.mAP.toFixed(4)} over ${Object.keys(pascal.perClass).length} classes`);
        }

        return report;
    }
}
