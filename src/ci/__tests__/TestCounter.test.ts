import { CommandExecutor, CommandResult } from '../../executor/CommandRunner';
import logger from '../../utils/logger';
import { CommandTestCounter, NullTestCounter, parseTestCount } from '../TestCounter';

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

class FakeExecutor implements CommandExecutor {
    calls: Array<{ command: string; cwd: string; timeoutMs?: number }> = [];

    constructor(private outcome: CommandResult | Error) {}

    async execute(command: string, cwd: string, timeoutMs?: number): Promise<CommandResult> {
        this.calls.push({ command, cwd, timeoutMs });
        if (this.outcome instanceof Error) {
            throw this.outcome;
        }
        return this.outcome;
    }
}

function result(stdout: string, exitCode = 0): CommandResult {
    return { exitCode, stdout, stderr: '', duration: 5 };
}

describe('parseTestCount', () => {
    it('should read pytest and jest summaries', () => {
        expect(parseTestCount('tests/test_a.py::test_one\n\n17 tests collected in 0.12s')).toBe(17);
        expect(parseTestCount('collected 1 item')).toBe(1);
        expect(parseTestCount('Tests:       2 failed, 40 passed, 42 total')).toBe(42);
        expect(parseTestCount('no tests ran')).toBe(0);
    });
});

describe('NullTestCounter', () => {
    it('should always count zero', async () => {
        await expect(new NullTestCounter().count()).resolves.toBe(0);
    });
});

describe('CommandTestCounter', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    it('should run the command in the project and parse its output', async () => {
        const executor = new FakeExecutor(result('collected 12 items'));
        const counter = new CommandTestCounter('pytest --collect-only -q', '/repo', 1000, executor);

        await expect(counter.count()).resolves.toBe(12);
        expect(executor.calls).toEqual([{ command: 'pytest --collect-only -q', cwd: '/repo', timeoutMs: 1000 }]);
    });

    it('should read counts printed on stderr', async () => {
        const executor = new FakeExecutor({ exitCode: 0, stdout: '', stderr: 'Tests:       8 passed, 8 total', duration: 5 });

        await expect(new CommandTestCounter('npx jest --listTests', '/repo', 1000, executor).count()).resolves.toBe(8);
    });

    it('should count zero when the command fails', async () => {
        const executor = new FakeExecutor(result('collected 12 items', 2));

        await expect(new CommandTestCounter('pytest', '/repo', 1000, executor).count()).resolves.toBe(0);
        expect(logger.warn).toHaveBeenCalledWith('Test count command exited with code 2');
    });

    it('should count zero when the command cannot run', async () => {
        const executor = new FakeExecutor(new Error('Command timed out after 1000ms'));

        await expect(new CommandTestCounter('pytest', '/repo', 1000, executor).count()).resolves.toBe(0);
        expect(logger.warn).toHaveBeenCalledWith('Could not determine test count: Command timed out after 1000ms');
    });
});
