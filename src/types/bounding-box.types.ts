import {BoundingBoxKind} from "./bounding-box-kind.enum";
import {AnnotationFormat} from "./annotation-format.enum";

export type ImageId = string | number;

export type BoxCoordinates = { x1: number; y1: number; x2: number; y2: number };

export type ImageSize = { width: number; height: number };

export type BoundingBoxInit = {
    imageId: ImageId;
    classLabel: string;
    kind: BoundingBoxKind;
    coordinates: readonly [number, number, number, number];
    format?: AnnotationFormat;      // defaults to XYX2Y2_ABSOLUTE
    imageSize?: ImageSize;          // required for YOLO_RELATIVE
    confidence?: number;            // required for DETECTED, dropped for GROUND_TRUTH
};

/** Object-size bucket by box area. */
export type SizeBucket = 'small' | 'medium' | 'large';
