import {z} from "zod";
import {InterpolationMethod} from "../types/interpolation-method.enum";
import {MatchingStrategy} from "../types/matching-strategy.enum";
import {ALL_METRICS, MetricSelection} from "../types/metric-selection.enum";
import {InvalidInputError} from "../utils/errors";

export type EvaluationConfig = {
    iouThreshold: number;                     // Pascal VOC threshold, (0, 1]
    metrics: readonly MetricSelection[];
    interpolation: InterpolationMethod;       // Pascal VOC AP
    matchingStrategy: MatchingStrategy;       // Pascal VOC matching; COCO always matches greedily
    classes?: readonly string[];              // undefined = every class
    debug: boolean;
};

export type EvaluationOptions = Partial<EvaluationConfig>;

export const DEFAULT_EVALUATION_CONFIG: Readonly<EvaluationConfig> = Object.freeze({
    iouThreshold: 0.5,
    metrics: ALL_METRICS,
    interpolation: InterpolationMethod.EVERY_POINT,
    matchingStrategy: MatchingStrategy.GREEDY,
    debug: false,
});

const EvaluationOptionsSchema = z.object({
    iouThreshold: z.number().gt(0).lte(1).optional(),
    metrics: z.array(z.nativeEnum(MetricSelection)).optional(),
    interpolation: z.nativeEnum(InterpolationMethod).optional(),
    matchingStrategy: z.nativeEnum(MatchingStrategy).optional(),
    classes: z.array(z.string().min(1)).optional(),
    debug: z.boolean().optional(),
});

/** Merges options over the defaults; rejects out-of-range values. */
export function buildConfig(options: EvaluationOptions = {}): EvaluationConfig {
    const parsed = EvaluationOptionsSchema.safeParse({
        ...options,
        metrics: options.metrics ? [...options.metrics] : undefined,
        classes: options.classes ? [...options.classes] : undefined,
    });
    if (!parsed.success) {
        throw InvalidInputError.fromZod('Invalid evaluation options', parsed.error);
    }
    const o = parsed.data;
    return {
        iouThreshold: o.iouThreshold ?? DEFAULT_EVALUATION_CONFIG.iouThreshold,
        // dedupe, keep the canonical order
        metrics: o.metrics ? ALL_METRICS.filter((m) => o.metrics?.includes(m)) : DEFAULT_EVALUATION_CONFIG.metrics,
        interpolation: o.interpolation ?? DEFAULT_EVALUATION_CONFIG.interpolation,
        matchingStrategy: o.matchingStrategy ?? DEFAULT_EVALUATION_CONFIG.matchingStrategy,
        classes: o.classes,
        debug: o.debug ?? DEFAULT_EVALUATION_CONFIG.debug,
    };
}
