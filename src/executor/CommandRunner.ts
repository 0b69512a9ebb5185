import { ChildProcess, spawn } from 'child_process';
import logger from '../utils/logger';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
    duration: number;
}

export interface CommandExecutor {
    execute(command: string, cwd: string, timeoutMs?: number): Promise<CommandResult>;
}

/**
 * Runs shell commands and captures their output
 */
export class CommandRunner implements CommandExecutor {
    /**
     * Rejects when the command cannot be started or exceeds the timeout
     */
    async execute(
        command: string,
        cwd: string,
        timeoutMs: number = 300000
    ): Promise<CommandResult> {
        const startTime = Date.now();

        logger.debug(`Executing command: ${command} in ${cwd}`);

        return new Promise((resolve, reject) => {
            // Own process group, so a timeout reaches what the shell started
            const ownGroup = process.platform !== 'win32';
            const child = spawn(command, {
                cwd,
                shell: true,
                detached: ownGroup,
                env: { ...process.env, FORCE_COLOR: '0' },
            });

            let stdout = '';
            let stderr = '';

            child.stdout?.on('data', (data: Buffer) => {
                stdout += data.toString();
            });

            child.stderr?.on('data', (data: Buffer) => {
                stderr += data.toString();
            });

            const timeoutId = setTimeout(() => {
                terminate(child, ownGroup);
                reject(new Error(`Command timed out after ${timeoutMs}ms`));
            }, timeoutMs);

            child.on('close', (code) => {
                clearTimeout(timeoutId);
                const duration = Date.now() - startTime;

                logger.debug(`Command completed with exit code ${code} in ${duration}ms`);
                resolve({
                    // null when the process was killed by a signal
                    exitCode: code ?? 1,
                    stdout,
                    stderr,
                    duration,
                });
            });

            child.on('error', (error) => {
                clearTimeout(timeoutId);
                logger.error(`Command execution error: ${error.message}`);
                reject(error);
            });
        });
    }
}

function terminate(child: ChildProcess, ownGroup: boolean): void {
    if (ownGroup && child.pid !== undefined) {
        try {
            process.kill(-child.pid, 'SIGTERM');
            return;
        } catch (error) {
            logger.debug(`Could not signal process group ${child.pid}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }
    child.kill();
}
