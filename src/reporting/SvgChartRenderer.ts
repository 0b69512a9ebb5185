import { escapeHtml } from './HtmlReportGenerator';

export interface ChartSeries {
    label: string;
    values: number[];
}

export interface LineChart {
    title: string;
    yLabel: string;
    /** ISO timestamps, one per point */
    timestamps: string[];
    series: ChartSeries[];
}

/**
 * Charting capability handed to the reporter. Returns the chart document text.
 */
export interface ChartRenderer {
    readonly extension: string;
    render(chart: LineChart): string;
}

const WIDTH = 960;
const HEIGHT = 540;
const MARGIN = { top: 60, right: 180, bottom: 70, left: 70 };
const COLORS = ['#667eea', '#10b981', '#f59e0b', '#ef4444', '#764ba2'];
const Y_TICKS = 5;

/**
 * Multi-series line chart as a standalone SVG document. The y axis is fixed to 0..100.
 */
export class SvgChartRenderer implements ChartRenderer {
    readonly extension = '.svg';

    render(chart: LineChart): string {
        const plotWidth = WIDTH - MARGIN.left - MARGIN.right;
        const plotHeight = HEIGHT - MARGIN.top - MARGIN.bottom;
        const points = chart.timestamps.length;

        const x = (index: number) =>
            MARGIN.left + (points > 1 ? (index / (points - 1)) * plotWidth : plotWidth / 2);
        const y = (value: number) =>
            MARGIN.top + plotHeight - (Math.min(100, Math.max(0, value)) / 100) * plotHeight;

        const grid: string[] = [];
        for (let tick = 0; tick <= Y_TICKS; tick++) {
            const value = (100 / Y_TICKS) * tick;
            grid.push(
                `<line class="grid" x1="${MARGIN.left}" y1="${y(value)}" x2="${MARGIN.left + plotWidth}" y2="${y(value)}" />`,
                `<text class="tick" x="${MARGIN.left - 10}" y="${y(value) + 4}" text-anchor="end">${value}</text>`
            );
        }

        // At most ten date labels along the x axis
        const step = Math.max(1, Math.ceil(points / 10));
        const xLabels: string[] = [];
        for (let index = 0; index < points; index += step) {
            xLabels.push(
                `<text class="tick" x="${x(index)}" y="${MARGIN.top + plotHeight + 20}" text-anchor="middle">${escapeHtml(chart.timestamps[index].slice(0, 10))}</text>`
            );
        }

        const lines = chart.series.map((series, seriesIndex) => {
            const color = COLORS[seriesIndex % COLORS.length];
            const path = series.values
                .map((value, index) => `${index === 0 ? 'M' : 'L'}${x(index).toFixed(1)},${y(value).toFixed(1)}`)
                .join(' ');
            const markers = series.values
                .map((value, index) => `<circle cx="${x(index).toFixed(1)}" cy="${y(value).toFixed(1)}" r="3" fill="${color}" />`)
                .join('');
            const legendY = MARGIN.top + seriesIndex * 22;
            return `<path d="${path}" fill="none" stroke="${color}" stroke-width="2" />${markers}` +
                `<rect x="${WIDTH - MARGIN.right + 20}" y="${legendY - 10}" width="12" height="12" fill="${color}" />` +
                `<text class="legend" x="${WIDTH - MARGIN.right + 38}" y="${legendY}">${escapeHtml(series.label)}</text>`;
        });

        return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${WIDTH}" height="${HEIGHT}" viewBox="0 0 ${WIDTH} ${HEIGHT}">
<style>
    text { font-family: -apple-system, 'Segoe UI', Roboto, sans-serif; fill: #1f2937; }
    .title { font-size: 20px; font-weight: bold; }
    .tick { font-size: 11px; fill: #6b7280; }
    .legend { font-size: 12px; }
    .grid { stroke: #e5e7eb; stroke-width: 1; }
</style>
<rect width="${WIDTH}" height="${HEIGHT}" fill="#ffffff" />
<text class="title" x="${WIDTH / 2}" y="32" text-anchor="middle">${escapeHtml(chart.title)}</text>
<text class="tick" transform="translate(20 ${MARGIN.top + plotHeight / 2}) rotate(-90)" text-anchor="middle">${escapeHtml(chart.yLabel)}</text>
${grid.join('\n')}
${xLabels.join('\n')}
${lines.join('\n')}
</svg>
`;
    }
}
