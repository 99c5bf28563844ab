import { mkdtemp, readdir, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CleanupError, DirectoryCreationError } from '../errors';
import {
    createWorkingDirectory,
    destroyWorkingDirectory,
    withWorkingDirectory,
    workingDirectoryName,
} from './workingDirectory';

const now = new Date(2024, 0, 2, 3, 4, 5);

describe('workingDirectoryName', () => {
    it('derives a second-resolution local timestamp name', () => {
        expect(workingDirectoryName(now)).toBe('temp_20240102030405');
    });
});

describe('working directory lifecycle', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'workdir-'));
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('creates the directory and returns its absolute path', async () => {
        const path = await createWorkingDirectory(root, now);

        expect(path).toBe(join(root, 'temp_20240102030405'));
        expect((await stat(path)).isDirectory()).toBe(true);
    });

    it('refuses to reuse an existing directory', async () => {
        await createWorkingDirectory(root, now);

        await expect(createWorkingDirectory(root, now)).rejects.toThrow(DirectoryCreationError);
    });

    it('removes the directory with its contents', async () => {
        const path = await createWorkingDirectory(root, now);
        await writeFile(join(path, 'train.csv'), 'id\n1\n');

        await destroyWorkingDirectory(path);

        expect(await readdir(root)).toEqual([]);
    });

    it('raises CleanupError when the directory is already gone', async () => {
        await expect(destroyWorkingDirectory(join(root, 'temp_19990101000000'))).rejects.toThrow(CleanupError);
    });

    it('releases the directory even when the body throws', async () => {
        await expect(
            withWorkingDirectory(
                async path => {
                    await writeFile(join(path, 'partial.csv'), 'x');
                    throw new Error('stage failed');
                },
                { root, now }
            )
        ).rejects.toThrow('stage failed');

        expect(await readdir(root)).toEqual([]);
    });

    it('keeps the body error as the cause when cleanup also fails', async () => {
        const stageError = new Error('stage failed');

        const error = await withWorkingDirectory(
            async path => {
                await rm(path, { recursive: true });
                throw stageError;
            },
            { root, now }
        ).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(CleanupError);
        if (!(error instanceof CleanupError)) return;
        expect(error.cause).toBe(stageError);
        expect(error.message).toBe(
            `Could not remove working directory '${join(root, 'temp_20240102030405')}': directory does not exist (after: stage failed)`
        );
    });

    it('returns the body result after releasing the directory', async () => {
        const result = await withWorkingDirectory(async path => path, { root, now });

        expect(result).toBe(join(root, 'temp_20240102030405'));
        expect(await readdir(root)).toEqual([]);
    });
});
