import path from 'path';
import { CoverageData, FileCoverageData } from '../models/CoverageModels';
import { fileExists, readFile } from '../utils/fileUtils';
import { CoverageReportReader } from './CoverageReportReader';

/**
 * Read-only provider of per-file coverage measurements.
 * `load()` rejects on I/O or parse failure; callers decide how to recover.
 */
export interface CoverageDataSource {
    describe(): string;
    load(): Promise<CoverageData>;
}

/**
 * Coverage data read from a report file on disk (coverage.py JSON, Istanbul JSON or Cobertura XML)
 */
export class FileCoverageSource implements CoverageDataSource {
    private reader: CoverageReportReader;

    constructor(private filePath: string, reader?: CoverageReportReader) {
        this.reader = reader ?? new CoverageReportReader();
    }

    describe(): string {
        return this.filePath;
    }

    async load(): Promise<CoverageData> {
        const content = await readFile(this.filePath);
        return this.reader.parse(content, path.extname(this.filePath).toLowerCase() === '.xml' ? 'xml' : 'json');
    }
}

/**
 * Coverage data held in memory, for embedding and tests
 */
export class InMemoryCoverageSource implements CoverageDataSource {
    constructor(private files: FileCoverageData[], private label: string = 'memory') {}

    describe(): string {
        return this.label;
    }

    async load(): Promise<CoverageData> {
        return {
            format: 'memory',
            files: this.files.map(file => ({
                ...file,
                executedLines: [...file.executedLines],
                missingLines: [...file.missingLines],
                executedBranches: file.executedBranches.map(([a, b]): [number, number] => [a, b]),
                missingBranches: file.missingBranches.map(([a, b]): [number, number] => [a, b]),
            })),
        };
    }
}

/**
 * Well-known report locations, checked in order
 */
export const COVERAGE_FILE_CANDIDATES = [
    'coverage.json',
    path.join('coverage', 'coverage-final.json'),
    'coverage.xml',
    path.join('coverage', 'cobertura-coverage.xml'),
];

/**
 * Find the first existing coverage report under the project root
 */
export async function detectCoverageFile(projectRoot: string): Promise<string | null> {
    for (const candidate of COVERAGE_FILE_CANDIDATES) {
        const fullPath = path.join(projectRoot, candidate);
        if (await fileExists(fullPath)) {
            return fullPath;
        }
    }
    return null;
}
