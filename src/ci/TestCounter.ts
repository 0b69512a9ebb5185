import { CommandExecutor, CommandRunner } from '../executor/CommandRunner';
import logger from '../utils/logger';

/**
 * Source of the current number of tests, recorded with each trend entry
 */
export interface TestCounter {
    /** Never rejects; yields 0 when the count cannot be determined */
    count(): Promise<number>;
}

export const DEFAULT_COUNT_TIMEOUT_MS = 30000;

const COUNT_PATTERNS = [
    // pytest --collect-only -q
    /(\d+)\s+tests?\s+collected/,
    // pytest
    /collected\s+(\d+)\s+items?/,
    // jest / vitest summary
    /Tests:.*?(\d+)\s+total/,
];

/**
 * Parse a test count from test-runner output; 0 when nothing matches
 */
export function parseTestCount(output: string): number {
    for (const pattern of COUNT_PATTERNS) {
        const match = pattern.exec(output);
        if (match) {
            return Number.parseInt(match[1], 10);
        }
    }
    return 0;
}

export class NullTestCounter implements TestCounter {
    async count(): Promise<number> {
        return 0;
    }
}

/**
 * Runs a test-collection command and parses its output
 */
export class CommandTestCounter implements TestCounter {
    constructor(
        private command: string,
        private cwd: string,
        private timeoutMs: number = DEFAULT_COUNT_TIMEOUT_MS,
        private runner: CommandExecutor = new CommandRunner()
    ) {}

    async count(): Promise<number> {
        try {
            const result = await this.runner.execute(this.command, this.cwd, this.timeoutMs);
            if (result.exitCode !== 0) {
                logger.warn(`Test count command exited with code ${result.exitCode}`);
                return 0;
            }
            return parseTestCount(`${result.stdout}\n${result.stderr}`);
        } catch (error) {
            logger.warn(`Could not determine test count: ${error instanceof Error ? error.message : String(error)}`);
            return 0;
        }
    }
}
