import {BoundingBox} from "./bounding-box";
import type {ImageId, SizeBucket} from "../types/bounding-box.types";

export type ClassStatistics = {
    boxes: number;
    images: number;
    sizes: Record<SizeBucket, number>;
    meanArea: number;
};

export type AnnotationStatistics = {
    totalBoxes: number;
    images: number;
    classes: string[];
    perClass: Record<string, ClassStatistics>;
    /** Boxes per image, images in first-seen order. */
    perImage: Map<ImageId, number>;
};

export function sizeBucket(area: number): SizeBucket {
    if (area < 32 ** 2) return 'small';
    if (area < 96 ** 2) return 'medium';
    return 'large';
}

/** Counts of a box collection by class, image and COCO size bucket. */
export function computeAnnotationStatistics(boxes: readonly BoundingBox[]): AnnotationStatistics {
    const perImage = new Map<ImageId, number>();
    const perClass = new Map<string, ClassStatistics>();
    const classImages = new Map<string, Set<ImageId>>();
    const areaSums = new Map<string, number>();

    for (const b of boxes) {
        perImage.set(b.imageId, (perImage.get(b.imageId) ?? 0) + 1);

        let stats = perClass.get(b.classLabel);
        if (!stats) {
            stats = { boxes: 0, images: 0, sizes: { small: 0, medium: 0, large: 0 }, meanArea: 0 };
            perClass.set(b.classLabel, stats);
        }
        stats.boxes++;
        stats.sizes[sizeBucket(b.area)]++;

        const seen = classImages.get(b.classLabel) ?? new Set<ImageId>();
        seen.add(b.imageId);
        classImages.set(b.classLabel, seen);
        areaSums.set(b.classLabel, (areaSums.get(b.classLabel) ?? 0) + b.area);
    }

    for (const [label, stats] of perClass) {
        stats.images = classImages.get(label)?.size ?? 0;
        stats.meanArea = (areaSums.get(label) ?? 0) / stats.boxes;
    }

    return {
        totalBoxes: boxes.length,
        images: perImage.size,
        classes: [...perClass.keys()].sort(),
        perClass: Object.fromEntries(perClass),
        perImage,
    };
}
