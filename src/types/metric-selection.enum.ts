export enum MetricSelection {
    AP = 'AP',
    AP50 = 'AP50',
    AP75 = 'AP75',
    AP_SMALL = 'APsmall',
    AP_MEDIUM = 'APmedium',
    AP_LARGE = 'APlarge',
    AR1 = 'AR1',
    AR10 = 'AR10',
    AR100 = 'AR100',
    AR_SMALL = 'ARsmall',
    AR_MEDIUM = 'ARmedium',
    AR_LARGE = 'ARlarge',
    PASCAL_AP = 'PascalAP',     // per-class AP and curves
    PASCAL_MAP = 'PascalmAP',
}

export const COCO_METRICS = [
    MetricSelection.AP,
    MetricSelection.AP50,
    MetricSelection.AP75,
    MetricSelection.AP_SMALL,
    MetricSelection.AP_MEDIUM,
    MetricSelection.AP_LARGE,
    MetricSelection.AR1,
    MetricSelection.AR10,
    MetricSelection.AR100,
    MetricSelection.AR_SMALL,
    MetricSelection.AR_MEDIUM,
    MetricSelection.AR_LARGE,
] as const;

export type CocoMetric = typeof COCO_METRICS[number];

export const PASCAL_METRICS = [MetricSelection.PASCAL_AP, MetricSelection.PASCAL_MAP] as const;

export const ALL_METRICS: readonly MetricSelection[] = [...COCO_METRICS, ...PASCAL_METRICS];

const COCO_METRIC_SET: ReadonlySet<MetricSelection> = new Set(COCO_METRICS);

export function isCocoMetric(metric: MetricSelection): metric is CocoMetric {
    return COCO_METRIC_SET.has(metric);
}
