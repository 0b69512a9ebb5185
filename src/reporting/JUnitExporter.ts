import { Builder } from 'xml2js';
import { SerializedGateResult } from '../validator/QualityGate';

export const JUNIT_SUITE_NAME = 'Coverage Analysis';
export const JUNIT_CLASS_NAME = 'CoverageAnalysis';

/**
 * JUnit XML with one test case per quality gate
 */
export function buildJUnitXml(results: SerializedGateResult[]): string {
    const failures = results.filter(r => r.status === 'FAIL').length;

    const testcase = results.map(result => {
        const attributes = { name: `QualityGate.${result.name}`, classname: JUNIT_CLASS_NAME };
        if (result.status === 'PASS') {
            return { $: attributes };
        }
        return {
            $: attributes,
            failure: [{ _: result.message, $: { message: result.message } }],
        };
    });

    const builder = new Builder({
        xmldec: { version: '1.0', encoding: 'UTF-8' },
        renderOpts: { pretty: true, indent: '    ', newline: '\n' },
    });

    return builder.buildObject({
        testsuite: {
            $: { name: JUNIT_SUITE_NAME, tests: results.length, failures, time: 0 },
            testcase,
        },
    }) + '\n';
}
