import { errorMessage } from '../errors';
import { Logger, consoleLogger } from '../utils/logger';

export interface TimeOfDay {
    hour: number;
    minute: number;
}

/** The first slot strictly after `from`. Missed slots are never replayed. */
export function nextOccurrence(from: Date, time: TimeOfDay): Date {
    const next = new Date(from);
    next.setHours(time.hour, time.minute, 0, 0);
    if (next.getTime() <= from.getTime()) {
        next.setDate(next.getDate() + 1);
    }
    return next;
}

export class DailySchedule {
    private timer: NodeJS.Timeout | null = null;

    constructor(
        private readonly time: TimeOfDay,
        private readonly onTick: () => Promise<void>,
        private readonly logger: Logger = consoleLogger,
        private readonly now: () => Date = () => new Date()
    ) {}

    get nextRun(): Date {
        return nextOccurrence(this.now(), this.time);
    }

    get isActive(): boolean {
        return this.timer !== null;
    }

    start(): void {
        if (this.timer !== null) return;
        this.scheduleNext();
    }

    stop(): void {
        if (this.timer !== null) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }

    private scheduleNext(): void {
        const next = this.nextRun;
        const delay = Math.max(0, next.getTime() - this.now().getTime());
        this.logger.log(`⏰ next scheduled run at ${next.toISOString()}`);

        this.timer = setTimeout(() => {
            this.scheduleNext();
            void this.onTick().catch((error: unknown) => {
                this.logger.error(`scheduled run failed: ${errorMessage(error)}`);
            });
        }, delay);
    }
}
