/** Layout of the four raw coordinates handed to `BoundingBox.create`. */
export enum AnnotationFormat {
    XYX2Y2_ABSOLUTE = 'xyx2y2',   // [x1, y1, x2, y2] in pixels
    XYWH_ABSOLUTE = 'xywh',       // [x, y, width, height] in pixels
    YOLO_RELATIVE = 'yolo',       // [cx, cy, width, height] relative to the image size
}
