/** Cumulative precision/recall along a confidence-ranked true/false positive sequence. */
export type CumulativeCounts = {
    precision: number[];
    recall: number[];
    truePositives: number;
    falsePositives: number;
};

export type InterpolatedAP = {
    ap: number;
    /** Precision samples after the envelope step. */
    precision: number[];
    /** Recall positions the samples belong to. */
    recall: number[];
};

export function accumulate(truePositiveFlags: readonly boolean[], totalPositives: number): CumulativeCounts {
    const precision: number[] = [];
    const recall: number[] = [];
    let tp = 0;
    let fp = 0;
    for (const isTp of truePositiveFlags) {
        if (isTp) tp++;
        else fp++;
        precision.push(tp / (tp + fp));
        recall.push(totalPositives > 0 ? tp / totalPositives : 0);
    }
    return { precision, recall, truePositives: tp, falsePositives: fp };
}

/** Each value replaced by the maximum of itself and every value after it. */
export function precisionEnvelope(precision: readonly number[]): number[] {
    const out = [...precision];
    for (let i = out.length - 2; i >= 0; i--) {
        out[i] = Math.max(out[i], out[i + 1]);
    }
    return out;
}

/** Area under the enveloped step curve (VOC 2010+). */
export function everyPointAP(recall: readonly number[], precision: readonly number[]): InterpolatedAP {
    const mrec = [0, ...recall, 1];
    const mpre = precisionEnvelope([0, ...precision, 0]);
    let ap = 0;
    for (let i = 1; i < mrec.length; i++) {
        if (mrec[i] !== mrec[i - 1]) ap += (mrec[i] - mrec[i - 1]) * mpre[i];
    }
    return { ap, precision: mpre.slice(0, -1), recall: mrec.slice(0, -1) };
}

/** Max precision at recall >= level, 0 when the curve never gets there. */
function sampleAt(levels: readonly number[], recall: readonly number[], precision: readonly number[]): number[] {
    const envelope = precisionEnvelope(precision);
    return levels.map((level) => {
        // recall is non-decreasing, so the first index reaching the level carries the envelope max
        const idx = recall.findIndex((r) => r >= level);
        return idx >= 0 ? envelope[idx] : 0;
    });
}

export function recallLevels(count: number): number[] {
    return Array.from({ length: count }, (_, i) => i / (count - 1));
}

/** VOC 2007 11-point sampling, recall levels 0, 0.1, ..., 1. */
export function elevenPointAP(recall: readonly number[], precision: readonly number[]): InterpolatedAP {
    const levels = recallLevels(11);
    const samples = sampleAt(levels, recall, precision);
    return { ap: mean(samples), precision: samples, recall: levels };
}

/** COCO 101-point sampling, recall levels 0, 0.01, ..., 1. */
export function interpolated101AP(recall: readonly number[], precision: readonly number[]): InterpolatedAP {
    const levels = recallLevels(101);
    const samples = sampleAt(levels, recall, precision);
    return { ap: mean(samples), precision: samples, recall: levels };
}

/** NaN for an empty list. */
export function mean(values: readonly number[]): number {
    if (!values.length) return NaN;
    return values.reduce((s, v) => s + v, 0) / values.length;
}
