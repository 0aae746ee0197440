import path from "node:path";
import {computeAnnotationStatistics} from "../src/annotations/annotation-statistics";
import {loadBoxes} from "./load-boxes";

const [, , boxesPathArg] = process.argv;
if (!boxesPathArg) {
    console.error("Usage: tsx examples/dataset-statistics.ts path/to/boxes.json");
    process.exit(1);
}

const { groundTruths, detections } = await loadBoxes(path.resolve(process.cwd(), boxesPathArg));

for (const [name, boxes] of [["Ground truth", groundTruths], ["Detections", detections]] as const) {
    const stats = computeAnnotationStatistics(boxes);
    console.log(`${name}: ${stats.totalBoxes} boxes in ${stats.images} images`);
    for (const label of stats.classes) {
        const c = stats.perClass[label];
        console.log(`  ${label}: ${c.boxes} boxes / ${c.images} images (small ${c.sizes.small}, medium ${c.sizes.medium}, large ${c.sizes.large})`);
    }
}
