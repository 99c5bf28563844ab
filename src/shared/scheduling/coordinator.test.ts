import { describe, expect, it } from 'vitest';
import { PipelineConfig, RunReport } from '../types';
import { DEFAULT_VARIANTS } from '../constants';
import { PipelineRunError, RunInProgressError } from '../errors';
import { Logger, silentLogger } from '../utils/logger';
import { RunCoordinator } from './coordinator';

const config: PipelineConfig = {
    dataDir: '/data',
    outputDir: '/output',
    workRoot: '/work',
    targetColumn: 'target',
    indexColumn: 'id',
    collinearColumns: [],
    significanceLevel: 0.05,
    csv: { delimiter: ',' },
    onMissingColumn: 'error',
    onUnknownLabel: 'error',
    variants: DEFAULT_VARIANTS,
    scheduleTime: { hour: 0, minute: 0 },
    port: 3000,
};

function report(status: RunReport['status']): RunReport {
    return {
        runId: 'temp_20240101000000',
        workingDirectory: '/work/temp_20240101000000',
        status,
        startedAt: '2024-01-01T00:00:00.000Z',
        finishedAt: '2024-01-01T00:00:01.000Z',
        tasks: { readData: status === 'success' ? 'success' : 'failed' },
        errors: [],
        warnings: [],
        outputs: {},
    };
}

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    let reject: (error: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

describe('RunCoordinator', () => {
    it('refuses a second trigger while a run is active', async () => {
        const pending = deferred<RunReport>();
        const coordinator = new RunCoordinator(config, {}, () => pending.promise);

        const first = coordinator.trigger();

        expect(coordinator.isRunning).toBe(true);
        expect(() => coordinator.trigger()).toThrow(RunInProgressError);

        pending.resolve(report('success'));
        await expect(first).resolves.toMatchObject({ status: 'success' });
        expect(coordinator.isRunning).toBe(false);
        expect(coordinator.lastReport?.status).toBe('success');
    });

    it('accepts a new trigger once the previous run finished', async () => {
        let calls = 0;
        const coordinator = new RunCoordinator(config, {}, async () => {
            calls++;
            return report('success');
        });

        await coordinator.trigger();
        await coordinator.trigger();

        expect(calls).toBe(2);
    });

    it('keeps the report of a failed run and rethrows', async () => {
        const failed = report('failed');
        const coordinator = new RunCoordinator(config, {}, async () => {
            throw new PipelineRunError(failed);
        });

        await expect(coordinator.trigger()).rejects.toThrow(PipelineRunError);
        expect(coordinator.lastReport).toBe(failed);
        expect(coordinator.isRunning).toBe(false);
    });

    it('passes configuration and options through to the runner', async () => {
        const seen: PipelineConfig[] = [];
        const coordinator = new RunCoordinator(config, {}, async received => {
            seen.push(received);
            return report('success');
        });

        await coordinator.trigger();

        expect(seen).toEqual([config]);
    });
});

describe('RunCoordinator.triggerScheduled', () => {
    function recordingLogger(warnings: string[]): Logger {
        return { ...silentLogger, warn: message => warnings.push(message) };
    }

    it('skips with a warning while another run is active', async () => {
        const warnings: string[] = [];
        const pending = deferred<RunReport>();
        let calls = 0;
        const coordinator = new RunCoordinator(config, { logger: recordingLogger(warnings) }, () => {
            calls++;
            return pending.promise;
        });

        const manual = coordinator.trigger();
        await expect(coordinator.triggerScheduled()).resolves.toBeUndefined();

        expect(calls).toBe(1);
        expect(warnings).toEqual(['Scheduled run skipped: previous run still active']);

        pending.resolve(report('success'));
        await manual;
    });

    it('starts a run when the coordinator is idle', async () => {
        const warnings: string[] = [];
        const coordinator = new RunCoordinator(config, { logger: recordingLogger(warnings) }, async () =>
            report('success')
        );

        await coordinator.triggerScheduled();

        expect(coordinator.lastReport?.status).toBe('success');
        expect(warnings).toEqual([]);
    });

    it('propagates run failures', async () => {
        const coordinator = new RunCoordinator(config, { logger: silentLogger }, async () => {
            throw new PipelineRunError(report('failed'));
        });

        await expect(coordinator.triggerScheduled()).rejects.toThrow(PipelineRunError);
    });
});
