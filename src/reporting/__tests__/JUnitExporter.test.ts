import { parseStringPromise } from 'xml2js';
import { buildJUnitXml } from '../JUnitExporter';
import { SerializedGateResult } from '../../validator/QualityGate';

const passing: SerializedGateResult = {
    name: 'Minimum Line Coverage',
    metric: 'line_coverage',
    threshold: 80,
    current: 85,
    status: 'PASS',
    difference: 5,
    severity: 'error',
    message: 'Minimum Line Coverage passed: 85.0 gte 80',
};

const failing: SerializedGateResult = {
    name: 'Critical Gaps Limit',
    metric: 'critical_gaps',
    threshold: 5,
    current: 7,
    status: 'FAIL',
    difference: 2,
    severity: 'error',
    message: 'Critical Gaps Limit failed: 7.0 not lte 5 (diff: 2.0)',
};

describe('buildJUnitXml', () => {
    it('should write one test case per gate with failures for failed gates', async () => {
        const xml = buildJUnitXml([passing, failing]);

        expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<testsuite name="Coverage Analysis" tests="2" failures="1" time="0">')).toBe(true);
        expect(xml.endsWith('</testsuite>\n')).toBe(true);
        expect(xml).toContain('<testcase name="QualityGate.Minimum Line Coverage" classname="CoverageAnalysis"/>');

        const parsed: unknown = await parseStringPromise(xml);
        expect(parsed).toEqual({
            testsuite: {
                $: { name: 'Coverage Analysis', tests: '2', failures: '1', time: '0' },
                testcase: [
                    { $: { name: 'QualityGate.Minimum Line Coverage', classname: 'CoverageAnalysis' } },
                    {
                        $: { name: 'QualityGate.Critical Gaps Limit', classname: 'CoverageAnalysis' },
                        failure: [{ _: failing.message, $: { message: failing.message } }],
                    },
                ],
            },
        });
    });

    it('should write an empty suite when there are no gates', () => {
        expect(buildJUnitXml([])).toBe(
            '<?xml version="1.0" encoding="UTF-8"?>\n<testsuite name="Coverage Analysis" tests="0" failures="0" time="0"/>\n'
        );
    });
});
