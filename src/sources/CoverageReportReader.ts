import path from 'path';
import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import { BranchArc, CoverageData, FileCoverageData, FunctionHit } from '../models/CoverageModels';

const arcSchema = z.tuple([z.number().int(), z.number().int()]);

const coveragePyFileSchema = z.object({
    executed_lines: z.array(z.number().int()),
    missing_lines: z.array(z.number().int()),
    executed_branches: z.array(arcSchema).optional(),
    missing_branches: z.array(arcSchema).optional(),
});

const coveragePySchema = z.object({
    files: z.record(coveragePyFileSchema),
});

const positionSchema = z.object({
    line: z.number().int(),
    column: z.number().int().nullable().optional(),
});

const rangeSchema = z.object({
    start: positionSchema,
    end: positionSchema,
});

const istanbulFileSchema = z.object({
    path: z.string(),
    statementMap: z.record(rangeSchema),
    s: z.record(z.number()),
    branchMap: z.record(z.object({
        loc: rangeSchema.optional(),
        line: z.number().int().optional(),
        locations: z.array(rangeSchema.partial()).optional(),
    })).default({}),
    b: z.record(z.array(z.number())).default({}),
    fnMap: z.record(z.object({
        name: z.string(),
        decl: rangeSchema.optional(),
        loc: rangeSchema.optional(),
        line: z.number().int().optional(),
    })).default({}),
    f: z.record(z.number()).default({}),
});

const istanbulSchema = z.record(istanbulFileSchema);

const coberturaLineSchema = z.object({
    $: z.object({
        number: z.string(),
        hits: z.string(),
        branch: z.string().optional(),
        'condition-coverage': z.string().optional(),
    }),
});

const coberturaLinesSchema = z.array(z.union([
    z.object({ line: z.array(coberturaLineSchema).optional() }),
    z.string(),
])).optional();

const coberturaClassSchema = z.object({
    $: z.object({ filename: z.string(), name: z.string().optional() }),
    methods: z.array(z.union([
        z.object({
            method: z.array(z.object({
                $: z.object({ name: z.string() }),
                lines: coberturaLinesSchema,
            })).optional(),
        }),
        z.string(),
    ])).optional(),
    lines: coberturaLinesSchema,
});

const coberturaSchema = z.object({
    coverage: z.object({
        sources: z.array(z.union([
            z.object({ source: z.array(z.string()).optional() }),
            z.string(),
        ])).optional(),
        packages: z.array(z.union([
            z.object({
                package: z.array(z.object({
                    classes: z.array(z.union([
                        z.object({ class: z.array(coberturaClassSchema).optional() }),
                        z.string(),
                    ])).optional(),
                })).optional(),
            }),
            z.string(),
        ])).optional(),
    }),
});

type CoberturaLine = z.infer<typeof coberturaLineSchema>;
type CoberturaLines = z.infer<typeof coberturaLinesSchema>;

export class CoverageFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CoverageFormatError';
    }
}

/**
 * Parses coverage reports into the normalized CoverageData shape
 */
export class CoverageReportReader {
    /**
     * Parse report content; JSON reports are told apart by shape
     */
    async parse(content: string, kind: 'json' | 'xml'): Promise<CoverageData> {
        if (kind === 'xml' || content.trimStart().startsWith('<')) {
            return this.parseCobertura(content);
        }

        let json: unknown;
        try {
            json = JSON.parse(content);
        } catch (error) {
            throw new CoverageFormatError(`Invalid coverage JSON: ${error instanceof Error ? error.message : String(error)}`);
        }

        if (typeof json === 'object' && json !== null && 'files' in json) {
            return this.parseCoveragePy(json);
        }
        return this.parseIstanbul(json);
    }

    /**
     * coverage.py `coverage json` output
     */
    parseCoveragePy(json: unknown): CoverageData {
        const parsed = coveragePySchema.safeParse(json);
        if (!parsed.success) {
            throw new CoverageFormatError(`Unrecognized coverage.py report: ${parsed.error.message}`);
        }

        const files: FileCoverageData[] = Object.entries(parsed.data.files).map(([filePath, data]) => ({
            path: filePath,
            executedLines: [...data.executed_lines].sort((a, b) => a - b),
            missingLines: [...data.missing_lines].sort((a, b) => a - b),
            executedBranches: (data.executed_branches ?? []).map(([from, to]): BranchArc => [from, to]),
            missingBranches: (data.missing_branches ?? []).map(([from, to]): BranchArc => [from, to]),
        }));

        return { format: 'coverage.py', files };
    }

    /**
     * Istanbul `coverage-final.json` output.
     * A line is executed when any statement starting on it ran.
     */
    parseIstanbul(json: unknown): CoverageData {
        const parsed = istanbulSchema.safeParse(json);
        if (!parsed.success) {
            throw new CoverageFormatError(`Unrecognized Istanbul report: ${parsed.error.message}`);
        }

        const files: FileCoverageData[] = Object.values(parsed.data).map(file => {
            const lineHits = new Map<number, number>();
            for (const [id, range] of Object.entries(file.statementMap)) {
                const line = range.start.line;
                lineHits.set(line, Math.max(lineHits.get(line) ?? 0, file.s[id] ?? 0));
            }

            const executedLines: number[] = [];
            const missingLines: number[] = [];
            for (const [line, hits] of [...lineHits.entries()].sort((a, b) => a[0] - b[0])) {
                (hits > 0 ? executedLines : missingLines).push(line);
            }

            const executedBranches: BranchArc[] = [];
            const missingBranches: BranchArc[] = [];
            for (const [id, branch] of Object.entries(file.branchMap)) {
                const line = branch.loc?.start.line ?? branch.line ?? 0;
                (file.b[id] ?? []).forEach((hits, arm) => {
                    (hits > 0 ? executedBranches : missingBranches).push([line, arm]);
                });
            }

            const functionHits: FunctionHit[] = Object.entries(file.fnMap).map(([id, fn]) => ({
                name: fn.name,
                line: fn.decl?.start.line ?? fn.loc?.start.line ?? fn.line ?? 0,
                hits: file.f[id] ?? 0,
            }));

            return { path: file.path, executedLines, missingLines, executedBranches, missingBranches, functionHits };
        });

        return { format: 'istanbul', files };
    }

    /**
     * Cobertura XML. File names are resolved against the first <source> element.
     */
    async parseCobertura(xml: string): Promise<CoverageData> {
        let document: unknown;
        try {
            document = await parseStringPromise(xml);
        } catch (error) {
            throw new CoverageFormatError(`Invalid Cobertura XML: ${error instanceof Error ? error.message : String(error)}`);
        }

        const parsed = coberturaSchema.safeParse(document);
        if (!parsed.success) {
            throw new CoverageFormatError(`Unrecognized Cobertura report: ${parsed.error.message}`);
        }

        const coverage = parsed.data.coverage;
        let sourceRoot = '';
        for (const sources of coverage.sources ?? []) {
            if (typeof sources !== 'string' && sources.source && sources.source.length > 0) {
                sourceRoot = sources.source[0].trim();
                break;
            }
        }

        const byPath = new Map<string, FileCoverageData>();
        for (const packages of coverage.packages ?? []) {
            if (typeof packages === 'string') continue;
            for (const pkg of packages.package ?? []) {
                for (const classes of pkg.classes ?? []) {
                    if (typeof classes === 'string') continue;
                    for (const cls of classes.class ?? []) {
                        const filePath = sourceRoot ? path.join(sourceRoot, cls.$.filename) : cls.$.filename;
                        const file = byPath.get(filePath) ?? {
                            path: filePath,
                            executedLines: [],
                            missingLines: [],
                            executedBranches: [],
                            missingBranches: [],
                            functionHits: [],
                        };
                        this.mergeCoberturaLines(file, collectLines(cls.lines));

                        for (const methods of cls.methods ?? []) {
                            if (typeof methods === 'string') continue;
                            for (const method of methods.method ?? []) {
                                const lines = collectLines(method.lines);
                                if (lines.length === 0) continue;
                                file.functionHits?.push({
                                    name: method.$.name,
                                    line: Number(lines[0].$.number),
                                    hits: Number(lines[0].$.hits),
                                });
                            }
                        }
                        byPath.set(filePath, file);
                    }
                }
            }
        }

        const files = [...byPath.values()].map(file => ({
            ...file,
            executedLines: [...new Set(file.executedLines)].sort((a, b) => a - b),
            missingLines: [...new Set(file.missingLines)].sort((a, b) => a - b),
        }));

        return { format: 'cobertura', files };
    }

    private mergeCoberturaLines(file: FileCoverageData, lines: CoberturaLine[]): void {
        for (const line of lines) {
            const number = Number(line.$.number);
            const hits = Number(line.$.hits);
            if (!Number.isFinite(number)) continue;

            (hits > 0 ? file.executedLines : file.missingLines).push(number);

            if (line.$.branch === 'true' && line.$['condition-coverage']) {
                const [covered, total] = parseConditionCoverage(line.$['condition-coverage']);
                for (let arm = 0; arm < total; arm++) {
                    (arm < covered ? file.executedBranches : file.missingBranches).push([number, arm]);
                }
            }
        }
    }
}

function collectLines(lines: CoberturaLines): CoberturaLine[] {
    const result: CoberturaLine[] = [];
    for (const entry of lines ?? []) {
        if (typeof entry !== 'string' && entry.line) {
            result.push(...entry.line);
        }
    }
    return result;
}

/**
 * "50% (1/2)" -> [1, 2]
 */
export function parseConditionCoverage(value: string): [number, number] {
    const match = value.match(/\((\d+)\/(\d+)\)/);
    if (!match) {
        return [0, 0];
    }
    return [Number(match[1]), Number(match[2])];
}
