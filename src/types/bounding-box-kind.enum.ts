export enum BoundingBoxKind {
    GROUND_TRUTH = 'GroundTruth',
    DETECTED = 'Detected',
}
