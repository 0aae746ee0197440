import path from "node:path";
import { promises as fs } from "node:fs";
import {MetricsAnalyzer} from "../src/analysis/metrics-analyzer";
import {drawPrecisionRecallCurve, drawPrecisionRecallCurves} from "../src/utils/draw-pr-curves";
import {MetricSelection} from "../src/types/metric-selection.enum";
import {loadBoxes} from "./load-boxes";

const [, , boxesPathArg, iouArg] = process.argv;
if (!boxesPathArg) {
    console.error("Usage: tsx examples/evaluate-json.ts path/to/boxes.json [iouThreshold]");
    process.exit(1);
}
const boxesPath = path.resolve(process.cwd(), boxesPathArg);
const outDir = path.resolve(process.cwd(), "results");
await fs.mkdir(outDir, { recursive: true });

const { groundTruths, detections } = await loadBoxes(boxesPath);
console.log(`📦 Loaded ${groundTruths.length} ground-truth and ${detections.length} detected boxes`);

const analyzer = new MetricsAnalyzer({
    iouThreshold: iouArg ? Number(iouArg) : undefined,
    debug: true,
});
const report = analyzer.analyze(groundTruths, detections);

for (const [metric, value] of Object.entries(report.coco ?? {})) {
    console.log(`${metric.padEnd(10)} ${(value ?? NaN).toFixed(4)}`);
}
if (report.pascal?.mAP !== undefined) {
    console.log(`mAP@${report.config.iouThreshold}  ${report.pascal.mAP.toFixed(4)}`);
}

if (report.config.metrics.includes(MetricSelection.PASCAL_AP) && report.curves.length) {
    const all = await drawPrecisionRecallCurve(report.curves, path.join(outDir, "precision_recall.png"), {
        mAP: report.pascal?.mAP,
        showAP: true,
    });
    console.log(`📈 Saved ${all.outPath}`);
    const perClass = await drawPrecisionRecallCurves(report.curves, outDir, { showAP: true });
    perClass.forEach((p) => console.log(`📈 Saved ${p}`));
}

const reportPath = path.join(outDir, "report.json");
await fs.writeFile(reportPath, JSON.stringify(report, null, 2), "utf8");
console.log(`\n💾 Report saved: ${reportPath}`);
