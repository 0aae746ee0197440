import {z} from "zod";
import {BoundingBoxKind} from "../types/bounding-box-kind.enum";
import {AnnotationFormat} from "../types/annotation-format.enum";
import type {BoundingBoxInit, BoxCoordinates, ImageId, ImageSize} from "../types/bounding-box.types";
import {InvalidInputError} from "../utils/errors";
import {area} from "../utils/geometry";

/** How far x2 may fall below x1 (or y2 below y1) before the box is rejected instead of clamped. */
export const INVERSION_TOLERANCE = 1e-6;

const coordinate = z.number().finite();

const BoundingBoxInitSchema = z.object({
    imageId: z.union([z.string().min(1), z.number().finite()]),
    classLabel: z.string().min(1),
    kind: z.nativeEnum(BoundingBoxKind),
    coordinates: z.tuple([coordinate, coordinate, coordinate, coordinate]),
    format: z.nativeEnum(AnnotationFormat).optional(),
    imageSize: z.object({
        width: z.number().finite().positive(),
        height: z.number().finite().positive(),
    }).optional(),
    confidence: z.number().min(0).max(1).optional(),
}).superRefine((init, ctx) => {
    if (init.kind === BoundingBoxKind.DETECTED && init.confidence === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['confidence'], message: 'detections need a confidence' });
    }
    if (init.format === AnnotationFormat.YOLO_RELATIVE && !init.imageSize) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['imageSize'], message: 'relative coordinates need the image size' });
    }
});

function toAbsolute(
    coordinates: readonly [number, number, number, number],
    format: AnnotationFormat,
    imageSize?: ImageSize,
): BoxCoordinates {
    const [a, b, c, d] = coordinates;
    switch (format) {
        case AnnotationFormat.XYX2Y2_ABSOLUTE:
            return { x1: a, y1: b, x2: c, y2: d };
        case AnnotationFormat.XYWH_ABSOLUTE:
            return { x1: a, y1: b, x2: a + c, y2: b + d };
        case AnnotationFormat.YOLO_RELATIVE: {
            const W = imageSize?.width ?? 0;
            const H = imageSize?.height ?? 0;
            const w = c * W;
            const h = d * H;
            const x1 = a * W - w / 2;
            const y1 = b * H - h / 2;
            return { x1, y1, x2: x1 + w, y2: y1 + h };
        }
    }
}

/**
 * One ground-truth or detected box in canonical absolute coordinates.
 *
 * Instances are frozen. `withKind` and `withClassLabel` return new boxes, so a
 * collection can be re-tagged for one evaluation without touching the boxes
 * another evaluation still holds.
 */
export class BoundingBox {
    readonly imageId: ImageId;
    readonly classLabel: string;
    readonly kind: BoundingBoxKind;
    readonly box: Readonly<BoxCoordinates>;
    readonly confidence?: number;

    private constructor(imageId: ImageId, classLabel: string, kind: BoundingBoxKind, box: BoxCoordinates, confidence?: number) {
        this.imageId = imageId;
        this.classLabel = classLabel;
        this.kind = kind;
        this.box = Object.freeze({ ...box });
        if (kind === BoundingBoxKind.DETECTED) this.confidence = confidence;
        Object.freeze(this);
    }

    /** Validates raw input and normalises it to absolute (x1, y1, x2, y2). */
    static create(init: BoundingBoxInit): BoundingBox {
        const parsed = BoundingBoxInitSchema.safeParse(init);
        if (!parsed.success) {
            throw InvalidInputError.fromZod('Invalid bounding box', parsed.error);
        }
        const { imageId, classLabel, kind, coordinates, format, imageSize, confidence } = parsed.data;
        const box = toAbsolute(coordinates, format ?? AnnotationFormat.XYX2Y2_ABSOLUTE, imageSize);
        if (box.x2 < box.x1 - INVERSION_TOLERANCE || box.y2 < box.y1 - INVERSION_TOLERANCE) {
            throw new InvalidInputError('Invalid bounding box', [
                `coordinates: inverted rectangle (${box.x1}, ${box.y1}, ${box.x2}, ${box.y2}) in image ${imageId}`,
            ]);
        }
        return new BoundingBox(imageId, classLabel, kind, box, confidence);
    }

    static groundTruth(imageId: ImageId, classLabel: string, coordinates: readonly [number, number, number, number]): BoundingBox {
        return BoundingBox.create({ imageId, classLabel, kind: BoundingBoxKind.GROUND_TRUTH, coordinates });
    }

    static detected(
        imageId: ImageId,
        classLabel: string,
        coordinates: readonly [number, number, number, number],
        confidence: number,
    ): BoundingBox {
        return BoundingBox.create({ imageId, classLabel, kind: BoundingBoxKind.DETECTED, coordinates, confidence });
    }

    get area(): number {
        return area(this.box);
    }

    get width(): number {
        return Math.max(0, this.box.x2 - this.box.x1);
    }

    get height(): number {
        return Math.max(0, this.box.y2 - this.box.y1);
    }

    /** Confidence used for ranking; ground truth ranks as 0. */
    get score(): number {
        return this.confidence ?? 0;
    }

    isGroundTruth(): boolean {
        return this.kind === BoundingBoxKind.GROUND_TRUTH;
    }

    /** A copy tagged with another kind. Re-tagging as DETECTED needs a confidence unless the box already has one. */
    withKind(kind: BoundingBoxKind, confidence?: number): BoundingBox {
        if (kind === this.kind && confidence === undefined) return this;
        return BoundingBox.create({
            imageId: this.imageId,
            classLabel: this.classLabel,
            kind,
            coordinates: [this.box.x1, this.box.y1, this.box.x2, this.box.y2],
            confidence: confidence ?? this.confidence,
        });
    }

    withClassLabel(classLabel: string): BoundingBox {
        return BoundingBox.create({
            imageId: this.imageId,
            classLabel,
            kind: this.kind,
            coordinates: [this.box.x1, this.box.y1, this.box.x2, this.box.y2],
            confidence: this.confidence,
        });
    }

    equals(other: BoundingBox): boolean {
        return this.imageId === other.imageId
            && this.classLabel === other.classLabel
            && this.kind === other.kind
            && this.confidence === other.confidence
            && this.box.x1 === other.box.x1
            && this.box.y1 === other.box.y1
            && this.box.x2 === other.box.x2
            && this.box.y2 === other.box.y2;
    }
}

/** Throws unless every entry is a BoundingBox of the given kind; at most ten issues are listed. */
export function assertBoxKind(boxes: readonly BoundingBox[], kind: BoundingBoxKind, name: string): void {
    const issues: string[] = [];
    boxes.forEach((b, i) => {
        if (!(b instanceof BoundingBox)) issues.push(`${name}[${i}]: not a BoundingBox`);
        else if (b.kind !== kind) issues.push(`${name}[${i}]: expected ${kind}, got ${b.kind}`);
    });
    if (issues.length) {
        throw new InvalidInputError(`Invalid ${name}`, issues.slice(0, 10));
    }
}

/** New array with every box re-tagged as ground truth; the input is left untouched. */
export function asGroundTruth(boxes: readonly BoundingBox[]): BoundingBox[] {
    return boxes.map((b) => b.withKind(BoundingBoxKind.GROUND_TRUTH));
}

/**
 * Replaces numeric class ids by names from an ordered class list (line N of a
 * `classes.txt` names id N). Labels that are not a valid index are kept.
 */
export function replaceIdsWithClasses(boxes: readonly BoundingBox[], classNames: readonly string[]): BoundingBox[] {
    return boxes.map((b) => {
        const id = Number(b.classLabel);
        const name = Number.isInteger(id) ? classNames[id] : undefined;
        return name ? b.withClassLabel(name) : b;
    });
}
