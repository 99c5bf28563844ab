import { PipelineConfig, RunReport } from '../types';
import { PipelineRunError, RunInProgressError } from '../errors';
import { RunOptions, runPreprocessing } from '../pipeline/orchestrator';
import { consoleLogger } from '../utils/logger';

export type PipelineRunner = (config: PipelineConfig, options: RunOptions) => Promise<RunReport>;

/** Allows at most one active run and keeps the most recent report. */
export class RunCoordinator {
    private active: Promise<RunReport> | null = null;
    private last: RunReport | null = null;

    constructor(
        private readonly config: PipelineConfig,
        private readonly options: RunOptions = {},
        private readonly runner: PipelineRunner = runPreprocessing
    ) {}

    get isRunning(): boolean {
        return this.active !== null;
    }

    get lastReport(): RunReport | null {
        return this.last;
    }

    trigger(): Promise<RunReport> {
        if (this.active !== null) {
            throw new RunInProgressError();
        }

        const run = this.runner(this.config, this.options)
            .then(
                report => {
                    this.last = report;
                    return report;
                },
                (error: unknown) => {
                    if (error instanceof PipelineRunError) {
                        this.last = error.report;
                    }
                    throw error;
                }
            )
            .finally(() => {
                this.active = null;
            });

        this.active = run;
        return run;
    }

    /** Scheduled ticks are skipped, not failed, while another run is active. */
    async triggerScheduled(): Promise<void> {
        try {
            await this.trigger();
        } catch (error) {
            if (error instanceof RunInProgressError) {
                (this.options.logger ?? consoleLogger).warn('Scheduled run skipped: previous run still active');
                return;
            }
            throw error;
        }
    }
}
