import type {BoxCoordinates} from "../types/bounding-box.types";

type Box = Readonly<BoxCoordinates>;

export function area(box: Box): number {
    return Math.max(0, box.x2 - box.x1) * Math.max(0, box.y2 - box.y1);
}

/** Overlap rectangle; inverted when the boxes are disjoint (its `area` is then 0). */
export function intersect(a: Box, b: Box): BoxCoordinates {
    const x1 = Math.max(a.x1, b.x1);
    const y1 = Math.max(a.y1, b.y1);
    const x2 = Math.min(a.x2, b.x2);
    const y2 = Math.min(a.y2, b.y2);
    return { x1, y1, x2, y2 };
}

export function intersectionArea(a: Box, b: Box): number {
    return area(intersect(a, b));
}

export function iou(a: Box, b: Box): number {
    const interA = intersectionArea(a, b);
    const unionA = area(a) + area(b) - interA;
    return unionA > 0 ? interA / unionA : 0;
}

/** IoU of every detection (rows) against every ground-truth box (columns). */
export function iouMatrix(detections: readonly Box[], groundTruths: readonly Box[]): number[][] {
    return detections.map((d) => groundTruths.map((g) => iou(d, g)));
}
