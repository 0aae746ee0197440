import {promises as fs} from "node:fs";
import {z} from "zod";
import {BoundingBox} from "../src/annotations/bounding-box";
import {AnnotationFormat} from "../src/types/annotation-format.enum";
import {BoundingBoxKind} from "../src/types/bounding-box-kind.enum";

const BoxRowSchema = z.object({
    imageId: z.union([z.string(), z.number()]),
    classLabel: z.string(),
    coordinates: z.tuple([z.number(), z.number(), z.number(), z.number()]),
    format: z.nativeEnum(AnnotationFormat).optional(),
    imageSize: z.object({ width: z.number(), height: z.number() }).optional(),
    confidence: z.number().optional(),
});

const BoxFileSchema = z.object({
    groundTruths: z.array(BoxRowSchema),
    detections: z.array(BoxRowSchema).default([]),
});

/** Reads `{ groundTruths: [...], detections: [...] }` with rows already in one of the AnnotationFormat layouts. */
export async function loadBoxes(filePath: string): Promise<{ groundTruths: BoundingBox[]; detections: BoundingBox[] }> {
    const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf8"));
    const file = BoxFileSchema.parse(raw);
    return {
        groundTruths: file.groundTruths.map((row) => BoundingBox.create({ ...row, kind: BoundingBoxKind.GROUND_TRUTH })),
        detections: file.detections.map((row) => BoundingBox.create({ ...row, kind: BoundingBoxKind.DETECTED })),
    };
}
