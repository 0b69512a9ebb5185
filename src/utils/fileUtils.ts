import fs from 'fs/promises';
import path from 'path';
import { glob } from 'fast-glob';

/**
 * Read file content
 */
export async function readFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
}

/**
 * Write content to file, creating parent directories
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Ensure directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Default excludes for source discovery: dependencies, build output, caches and tests
 */
export const DEFAULT_SOURCE_EXCLUDES = [
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/__pycache__/**',
    '**/.git/**',
    '**/coverage/**',
    '**/__tests__/**',
    '**/*.test.*',
    '**/*.spec.*',
    '**/test_*.py',
    '**/*.d.ts',
];

/**
 * Find source files with the given extensions under a directory.
 * Returned paths are relative to `directory` and use forward slashes.
 */
export async function findSourceFiles(
    directory: string,
    extensions: string[],
    excludePatterns: string[] = []
): Promise<string[]> {
    const patterns = extensions.map(ext => `**/*${ext}`);

    const files = await glob(patterns, {
        cwd: directory,
        ignore: [...DEFAULT_SOURCE_EXCLUDES, ...excludePatterns],
        absolute: false,
        onlyFiles: true,
    });

    return files.sort();
}

/**
 * Format a date as YYYYMMDD_HHMMSS (UTC) for artifact file names
 */
export function formatFileStamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
        `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}
