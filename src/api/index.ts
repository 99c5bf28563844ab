import { createApp } from './app';
import {
    DailySchedule,
    PipelineRunError,
    RunCoordinator,
    consoleLogger,
    errorMessage,
    loadConfigFromEnvironment,
} from '../shared';

async function runOnce(coordinator: RunCoordinator): Promise<void> {
    try {
        const report = await coordinator.trigger();
        console.log(JSON.stringify(report, null, 2));
    } catch (error) {
        if (error instanceof PipelineRunError) {
            console.error(JSON.stringify(error.report, null, 2));
        }
        consoleLogger.error(errorMessage(error));
        process.exitCode = 1;
    }
}

function serve(coordinator: RunCoordinator, port: number, time: { hour: number; minute: number }): void {
    const schedule = new DailySchedule(time, () => coordinator.triggerScheduled());

    const app = createApp(coordinator);
    const server = app.listen(port, () => {
        console.log(`Server is running on http://localhost:${port}`);
        schedule.start();
    });

    const shutdown = (): void => {
        schedule.stop();
        server.close();
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

const config = loadConfigFromEnvironment();
const coordinator = new RunCoordinator(config, { logger: consoleLogger });

if (process.argv.includes('--once')) {
    await runOnce(coordinator);
} else {
    serve(coordinator, config.port, config.scheduleTime);
}
