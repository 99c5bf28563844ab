import { ArtifactOverwriteError, UpstreamArtifactMissingError } from '../errors';

/**
 * Process-wide result store, partitioned by run. Each stage publishes its
 * output once per run; later stages read it through the run's scope.
 */
export class ArtifactStore<A extends object> {
    private readonly runs = new Map<string, Partial<A>>();

    scope(runId: string): RunArtifacts<A> {
        return new RunArtifacts(this, runId);
    }

    publish<K extends keyof A & string>(runId: string, stageId: K, value: A[K]): void {
        const bucket = this.bucket(runId);
        if (stageId in bucket) {
            throw new ArtifactOverwriteError(runId, stageId);
        }
        bucket[stageId] = value;
    }

    find<K extends keyof A & string>(runId: string, stageId: K): A[K] | undefined {
        const bucket = this.runs.get(runId);
        if (bucket === undefined) return undefined;
        const value: A[K] | undefined = bucket[stageId];
        return value;
    }

    get<K extends keyof A & string>(runId: string, stageId: K): A[K] {
        const value = this.find(runId, stageId);
        if (value === undefined) {
            throw new UpstreamArtifactMissingError(runId, stageId);
        }
        return value;
    }

    stageIds(runId: string): string[] {
        return Object.keys(this.runs.get(runId) ?? {});
    }

    runIds(): string[] {
        return [...this.runs.keys()];
    }

    /** Drops every artifact of the run; returns how many were removed. */
    purge(runId: string): number {
        const removed = this.stageIds(runId).length;
        this.runs.delete(runId);
        return removed;
    }

    private bucket(runId: string): Partial<A> {
        let bucket = this.runs.get(runId);
        if (bucket === undefined) {
            bucket = {};
            this.runs.set(runId, bucket);
        }
        return bucket;
    }
}

export class RunArtifacts<A extends object> {
    constructor(private readonly store: ArtifactStore<A>, readonly runId: string) {}

    publish<K extends keyof A & string>(stageId: K, value: A[K]): void {
        this.store.publish(this.runId, stageId, value);
    }

    get<K extends keyof A & string>(stageId: K): A[K] {
        return this.store.get(this.runId, stageId);
    }

    find<K extends keyof A & string>(stageId: K): A[K] | undefined {
        return this.store.find(this.runId, stageId);
    }

    purge(): number {
        return this.store.purge(this.runId);
    }
}
