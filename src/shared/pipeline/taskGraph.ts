import { TaskState } from '../types';
import { GraphDefinitionError, errorMessage } from '../errors';
import { Logger, silentLogger } from '../utils/logger';

/**
 * allSuccess: run only when every predecessor succeeded.
 * allDone: run once every predecessor has finished, whatever the outcome.
 */
export type TriggerRule = 'allSuccess' | 'allDone';

export interface TaskDefinition {
    id: string;
    dependsOn?: string[];
    trigger?: TriggerRule;
    run: () => Promise<void>;
}

export interface GraphRunOptions {
    signal?: AbortSignal;
    logger?: Logger;
}

export interface GraphRunResult {
    states: { [taskId: string]: TaskState };
    errors: { taskId: string; error: unknown }[];
}

function isFinished(state: TaskState): boolean {
    return state !== 'pending' && state !== 'running';
}

export class TaskGraph {
    private readonly tasks = new Map<string, TaskDefinition>();

    addTask(task: TaskDefinition): this {
        if (this.tasks.has(task.id)) {
            throw new GraphDefinitionError(`Task '${task.id}' is declared twice`);
        }
        this.tasks.set(task.id, task);
        return this;
    }

    get taskIds(): string[] {
        return [...this.tasks.keys()];
    }

    dependenciesOf(taskId: string): string[] {
        return this.tasks.get(taskId)?.dependsOn ?? [];
    }

    /** Returns a topological order, or throws on unknown dependencies and cycles. */
    validate(): string[] {
        for (const task of this.tasks.values()) {
            for (const dependency of task.dependsOn ?? []) {
                if (!this.tasks.has(dependency)) {
                    throw new GraphDefinitionError(`Task '${task.id}' depends on unknown task '${dependency}'`);
                }
            }
        }

        const order: string[] = [];
        const visiting = new Set<string>();
        const visited = new Set<string>();

        const visit = (id: string, path: string[]): void => {
            if (visited.has(id)) return;
            if (visiting.has(id)) {
                throw new GraphDefinitionError(`Cycle detected: ${[...path, id].join(' -> ')}`);
            }
            visiting.add(id);
            this.dependenciesOf(id).forEach(dependency => visit(dependency, [...path, id]));
            visiting.delete(id);
            visited.add(id);
            order.push(id);
        };

        this.taskIds.forEach(id => visit(id, []));
        return order;
    }

    async run(options: GraphRunOptions = {}): Promise<GraphRunResult> {
        const order = this.validate();
        const logger = options.logger ?? silentLogger;
        const states: { [taskId: string]: TaskState } = {};
        const errors: { taskId: string; error: unknown }[] = [];
        const running = new Map<string, Promise<string>>();

        order.forEach(id => {
            states[id] = 'pending';
        });

        const execute = async (task: TaskDefinition): Promise<string> => {
            logger.log(`▶ ${task.id}`);
            try {
                await task.run();
                states[task.id] = 'success';
                logger.success(task.id);
            } catch (error) {
                states[task.id] = 'failed';
                errors.push({ taskId: task.id, error });
                logger.error(`${task.id}: ${errorMessage(error)}`);
            }
            return task.id;
        };

        const launchReady = (): void => {
            let changed = true;
            while (changed) {
                changed = false;
                for (const id of order) {
                    const task = this.tasks.get(id);
                    if (task === undefined || states[id] !== 'pending') continue;

                    const dependencies = task.dependsOn ?? [];
                    if (!dependencies.every(dependency => isFinished(states[dependency]))) continue;

                    if ((task.trigger ?? 'allSuccess') === 'allSuccess') {
                        if (options.signal?.aborted) {
                            states[id] = 'cancelled';
                            logger.warn(`${id} cancelled`);
                            changed = true;
                            continue;
                        }
                        if (dependencies.some(dependency => states[dependency] !== 'success')) {
                            states[id] = 'upstreamFailed';
                            logger.warn(`${id} skipped: upstream failed`);
                            changed = true;
                            continue;
                        }
                    }

                    states[id] = 'running';
                    running.set(id, execute(task));
                }
            }
        };

        launchReady();
        while (running.size > 0) {
            const finished = await Promise.race(running.values());
            running.delete(finished);
            launchReady();
        }

        return { states, errors };
    }
}
