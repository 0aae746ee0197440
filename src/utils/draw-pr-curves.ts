import sharp from "sharp";
import path from "node:path";
import {promises as fs} from "node:fs";
import type {PrecisionRecallCurve} from "../interfaces/evaluation-result";

export type CurveChartOptions = {
    width?: number;
    height?: number;
    title?: string;
    mAP?: number;                                 // shown in the title when given
    showAP?: boolean;                             // "label (AP: 87.50%)" in the legend
    classPalette?: Record<string, string>;        // optional: { "person": "#22c55e", ... }
};

export type PlotArea = { left: number; top: number; width: number; height: number };

const esc = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

/** Deterministic color per label: hash → HSL → hex. */
export function colorForLabel(label: string, classPalette?: Record<string, string>): string {
    if (classPalette?.[label]) return classPalette[label];
    let hash = 0;
    for (let i = 0; i < label.length; i++) hash = (hash * 31 + label.charCodeAt(i)) | 0;
    const h = Math.abs(hash) % 360, s = 70, l = 50;
    const a = (s / 100) * Math.min(l / 100, 1 - l / 100);
    const f = (n: number) => {
        const k = (n + h / 30) % 12;
        const c = l / 100 - a * Math.max(-1, Math.min(k - 3, Math.min(9 - k, 1)));
        return Math.round(255 * c);
    };
    return `#${[f(0), f(8), f(4)].map(v => v.toString(16).padStart(2, '0')).join('')}`;
}

/** Recall on x, precision on y (SVG y grows downwards). */
export function toPolylinePoints(recall: readonly number[], precision: readonly number[], plot: PlotArea): string {
    return recall.map((r, i) => {
        const x = plot.left + r * plot.width;
        const y = plot.top + (1 - (precision[i] ?? 0)) * plot.height;
        return `${x.toFixed(1)},${y.toFixed(1)}`;
    }).join(' ');
}

export function formatPercent(value: number): string {
    return Number.isNaN(value) ? 'n/a' : `${(value * 100).toFixed(2)}%`;
}

export function buildPrecisionRecallSvg(curves: readonly PrecisionRecallCurve[], options: CurveChartOptions = {}): string {
    const W = options.width ?? 640;
    const H = options.height ?? 480;
    const plot: PlotArea = { left: 60, top: 40, width: W - 60 - 160, height: H - 40 - 50 };
    const fontSize = 12;

    const title = options.title
        ?? (options.mAP !== undefined ? `Precision x Recall (mAP: ${formatPercent(options.mAP)})` : 'Precision x Recall');

    let svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${W}" height="${H}">
    <style>.lbl{font-family:-apple-system,BlinkMacSystemFont,Segoe UI,Roboto,Helvetica,Arial;font-size:${fontSize}px;}</style>
    <rect x="0" y="0" width="${W}" height="${H}" fill="#ffffff"/>
    <text x="${plot.left}" y="${plot.top - 15}" class="lbl" font-weight="600">${esc(title)}</text>
    <rect x="${plot.left}" y="${plot.top}" width="${plot.width}" height="${plot.height}" fill="none" stroke="#333333"/>`;

    // grid and ticks every 0.2
    for (let i = 0; i <= 5; i++) {
        const v = i / 5;
        const x = plot.left + v * plot.width;
        const y = plot.top + (1 - v) * plot.height;
        svg += `
    <line x1="${x}" y1="${plot.top}" x2="${x}" y2="${plot.top + plot.height}" stroke="#e5e7eb"/>
    <line x1="${plot.left}" y1="${y}" x2="${plot.left + plot.width}" y2="${y}" stroke="#e5e7eb"/>
    <text x="${x - 8}" y="${plot.top + plot.height + 16}" class="lbl">${v.toFixed(1)}</text>
    <text x="${plot.left - 30}" y="${y + 4}" class="lbl">${v.toFixed(1)}</text>`;
    }
    svg += `
    <text x="${plot.left + plot.width / 2 - 20}" y="${H - 10}" class="lbl">recall</text>
    <text x="12" y="${plot.top + plot.height / 2}" class="lbl">precision</text>`;

    curves.forEach((curve, idx) => {
        const col = colorForLabel(curve.classLabel, options.classPalette);
        const legend = options.showAP ? `${curve.classLabel} (AP: ${formatPercent(curve.ap)})` : curve.classLabel;
        const legendY = plot.top + 10 + idx * (fontSize + 8);
        svg += `
    <polyline points="${toPolylinePoints(curve.recall, curve.precision, plot)}" fill="none" stroke="${col}" stroke-width="2"/>
    <rect x="${plot.left + plot.width + 15}" y="${legendY - fontSize + 2}" width="10" height="10" fill="${col}"/>
    <text x="${plot.left + plot.width + 30}" y="${legendY}" class="lbl">${esc(legend)}</text>`;
    });

    svg += `</svg>`;
    return svg;
}

/** One chart with every curve. */
export async function drawPrecisionRecallCurve(
    curves: readonly PrecisionRecallCurve[],
    outPath: string,
    options: CurveChartOptions = {},
): Promise<{ outPath: string; svg: string }> {
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    const svg = buildPrecisionRecallSvg(curves, options);
    await sharp(Buffer.from(svg)).png().toFile(outPath);
    return { outPath, svg };
}

/**
 * File names for the per-class charts. Characters outside [A-Za-z0-9_.-]
 * become "_"; a name already taken, ignoring case, gets "-2", "-3", ...
 * appended.
 */
export function chartFileNames(labels: readonly string[]): string[] {
    const used = new Set<string>();
    return labels.map((label) => {
        const base = label.replace(/[^\w.-]+/g, '_');
        let name = `${base}.png`;
        for (let n = 2; used.has(name.toLowerCase()); n++) name = `${base}-${n}.png`;
        used.add(name.toLowerCase());
        return name;
    });
}

/** One chart per class, written as `<outDir>/<label>.png`. */
export async function drawPrecisionRecallCurves(
    curves: readonly PrecisionRecallCurve[],
    outDir: string,
    options: CurveChartOptions = {},
): Promise<string[]> {
    const written: string[] = [];
    const fileNames = chartFileNames(curves.map((c) => c.classLabel));
    for (const [i, curve] of curves.entries()) {
        const fileName = fileNames[i];
        const { outPath } = await drawPrecisionRecallCurve([curve], path.join(outDir, fileName), {
            ...options,
            title: options.title ?? `${curve.classLabel} (AP: ${formatPercent(curve.ap)})`,
        });
        written.push(outPath);
    }
    return written;
}
