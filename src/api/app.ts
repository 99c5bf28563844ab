import express, { Express, Request, Response } from 'express';
import { RunCoordinator } from '../shared/scheduling/coordinator';
import { RunInProgressError, errorMessage } from '../shared/errors';
import { Logger, consoleLogger } from '../shared/utils/logger';

export function createApp(coordinator: RunCoordinator, logger: Logger = consoleLogger): Express {
    const app = express();

    app.use(express.json());

    app.get('/api/health', (req: Request, res: Response): void => {
        res.status(200).json({ status: 'ok', running: coordinator.isRunning });
    });

    // Manual trigger; the run continues after the response is sent.
    app.post('/api/runs', (req: Request, res: Response): void => {
        let run: Promise<unknown>;
        try {
            run = coordinator.trigger();
        } catch (error) {
            if (error instanceof RunInProgressError) {
                res.status(409).json({ error: error.message });
                return;
            }
            throw error;
        }

        void run.then(
            () => logger.success('manual run finished'),
            (error: unknown) => logger.error(`manual run failed: ${errorMessage(error)}`)
        );
        res.status(202).json({ status: 'started' });
    });

    app.get('/api/runs/last', (req: Request, res: Response): void => {
        const report = coordinator.lastReport;
        if (report === null) {
            res.status(404).json({ error: 'No run has finished yet' });
            return;
        }
        res.status(200).json(report);
    });

    return app;
}
