import { mkdir, rm, stat } from 'fs/promises';
import { resolve } from 'path';
import { WORKING_DIRECTORY_PREFIX } from '../constants';
import { CleanupError, DirectoryCreationError, errorMessage } from '../errors';

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

/** temp_YYYYMMDDHHMMSS in local time. */
export function workingDirectoryName(now: Date): string {
    const stamp = [
        now.getFullYear(),
        pad(now.getMonth() + 1),
        pad(now.getDate()),
        pad(now.getHours()),
        pad(now.getMinutes()),
        pad(now.getSeconds()),
    ].join('');
    return `${WORKING_DIRECTORY_PREFIX}${stamp}`;
}

export async function createWorkingDirectory(root: string = process.cwd(), now: Date = new Date()): Promise<string> {
    const path = resolve(root, workingDirectoryName(now));
    try {
        await mkdir(path);
    } catch (error) {
        throw new DirectoryCreationError(path, { cause: error });
    }
    return path;
}

export async function destroyWorkingDirectory(path: string): Promise<void> {
    try {
        await stat(path);
    } catch (error) {
        throw new CleanupError(path, 'directory does not exist', { cause: error });
    }

    try {
        await rm(path, { recursive: true });
    } catch (error) {
        throw new CleanupError(path, errorMessage(error), { cause: error });
    }
}

export async function withWorkingDirectory<T>(
    fn: (path: string) => Promise<T>,
    options: { root?: string; now?: Date } = {}
): Promise<T> {
    const path = await createWorkingDirectory(options.root, options.now);
    let result: T;
    try {
        result = await fn(path);
    } catch (error) {
        // A failed cleanup after a failed body keeps the body's error as its cause.
        try {
            await destroyWorkingDirectory(path);
        } catch (cleanupError) {
            const reason = cleanupError instanceof CleanupError ? cleanupError.reason : errorMessage(cleanupError);
            throw new CleanupError(path, `${reason} (after: ${errorMessage(error)})`, { cause: error });
        }
        throw error;
    }
    await destroyWorkingDirectory(path);
    return result;
}
