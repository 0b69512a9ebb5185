import { SvgChartRenderer } from '../SvgChartRenderer';

describe('SvgChartRenderer', () => {
    const renderer = new SvgChartRenderer();

    it('should render a standalone SVG document with a title and axis label', () => {
        const svg = renderer.render({
            title: 'Coverage & Trends',
            yLabel: 'Coverage (%)',
            timestamps: ['2024-05-01T00:00:00.000Z', '2024-05-02T00:00:00.000Z'],
            series: [{ label: 'Line Coverage', values: [0, 100] }],
        });

        expect(renderer.extension).toBe('.svg');
        expect(svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="960" height="540"')).toBe(true);
        expect(svg).toContain('<text class="title" x="480" y="32" text-anchor="middle">Coverage &amp; Trends</text>');
        expect(svg).toContain('rotate(-90)" text-anchor="middle">Coverage (%)</text>');
        expect(svg.trimEnd().endsWith('</svg>')).toBe(true);
    });

    it('should plot values on a fixed 0..100 scale', () => {
        const svg = renderer.render({
            title: 't',
            yLabel: 'y',
            timestamps: ['2024-05-01T00:00:00.000Z', '2024-05-02T00:00:00.000Z', '2024-05-03T00:00:00.000Z'],
            series: [
                { label: 'Line', values: [0, 50, 100] },
                { label: 'Branch', values: [120, -5, 25] },
            ],
        });

        expect(svg).toContain('<path d="M70.0,470.0 L425.0,265.0 L780.0,60.0" fill="none" stroke="#667eea" stroke-width="2" />');
        expect(svg).toContain('<path d="M70.0,60.0 L425.0,470.0 L780.0,367.5" fill="none" stroke="#10b981" stroke-width="2" />');
        expect(svg).toContain('<text class="legend" x="818" y="60">Line</text>');
        expect(svg).toContain('<text class="legend" x="818" y="82">Branch</text>');
        expect(svg).toContain('<text class="tick" x="60" y="64" text-anchor="end">100</text>');
    });

    it('should center a single point', () => {
        const svg = renderer.render({
            title: 't',
            yLabel: 'y',
            timestamps: ['2024-05-01T00:00:00.000Z'],
            series: [{ label: 'Line', values: [50] }],
        });

        expect(svg).toContain('<circle cx="425.0" cy="265.0" r="3" fill="#667eea" />');
    });

    it('should label at most ten dates along the x axis', () => {
        const timestamps = Array.from({ length: 25 }, (_, i) => new Date(Date.UTC(2024, 0, i + 1)).toISOString());

        const svg = renderer.render({ title: 't', yLabel: 'y', timestamps, series: [] });

        const labels = svg.match(/text-anchor="middle">2024-01-\d\d<\/text>/g) ?? [];
        expect(labels).toHaveLength(9);
        expect(svg).toContain('>2024-01-01</text>');
        expect(svg).toContain('>2024-01-25</text>');
    });
});
