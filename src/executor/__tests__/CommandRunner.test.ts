import { ChildProcess, spawn } from 'child_process';
import { CommandRunner } from '../CommandRunner';

jest.mock('child_process', () => ({
    ...jest.requireActual('child_process'),
    spawn: jest.fn(),
}));

jest.mock('../../utils/logger', () => ({
    __esModule: true,
    default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const posix = process.platform !== 'win32';

function fakeChild(pid: number): ChildProcess {
    const child = new ChildProcess();
    Object.defineProperty(child, 'pid', { value: pid });
    return child;
}

describe('CommandRunner', () => {
    let child: ChildProcess;
    let childKill: jest.SpyInstance;
    let groupKill: jest.SpyInstance;

    beforeEach(() => {
        jest.useFakeTimers();
        child = fakeChild(4321);
        childKill = jest.spyOn(child, 'kill').mockReturnValue(true);
        groupKill = jest.spyOn(process, 'kill').mockReturnValue(true);
        jest.mocked(spawn).mockReturnValue(child);
    });

    afterEach(() => {
        jest.useRealTimers();
        jest.restoreAllMocks();
        jest.mocked(spawn).mockReset();
    });

    it('should resolve with the exit code and output', async () => {
        const pending = new CommandRunner().execute('pytest -q', '/work', 1000);
        child.emit('close', 3);

        await expect(pending).resolves.toMatchObject({ exitCode: 3, stdout: '', stderr: '' });
        expect(spawn).toHaveBeenCalledWith('pytest -q', expect.objectContaining({ cwd: '/work', shell: true, detached: posix }));
    });

    it('should report a signal exit as code 1', async () => {
        const pending = new CommandRunner().execute('pytest -q', '/work', 1000);
        child.emit('close', null);

        await expect(pending).resolves.toMatchObject({ exitCode: 1 });
    });

    (posix ? it : it.skip)('should signal the whole process group on timeout', async () => {
        const pending = new CommandRunner().execute('pytest -q', '/work', 1000);
        jest.advanceTimersByTime(1000);

        await expect(pending).rejects.toThrow('Command timed out after 1000ms');
        expect(groupKill).toHaveBeenCalledWith(-4321, 'SIGTERM');
        expect(childKill).not.toHaveBeenCalled();
    });

    (posix ? it : it.skip)('should fall back to the shell process when the group is gone', async () => {
        groupKill.mockImplementation(() => {
            throw new Error('ESRCH');
        });

        const pending = new CommandRunner().execute('pytest -q', '/work', 1000);
        jest.advanceTimersByTime(1000);

        await expect(pending).rejects.toThrow('Command timed out after 1000ms');
        expect(childKill).toHaveBeenCalledTimes(1);
    });

    it('should reject when the command cannot start', async () => {
        const pending = new CommandRunner().execute('missing-tool', '/work', 1000);
        child.emit('error', new Error('spawn ENOENT'));

        await expect(pending).rejects.toThrow('spawn ENOENT');
    });
});
