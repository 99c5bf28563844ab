import type { RunReport } from '../types';

export class PipelineError extends Error {
    readonly code: string;

    constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class DirectoryCreationError extends PipelineError {
    constructor(readonly path: string, options?: { cause?: unknown }) {
        super('DIRECTORY_CREATION', `Could not create working directory '${path}'`, options);
    }
}

export class CleanupError extends PipelineError {
    constructor(readonly path: string, readonly reason: string, options?: { cause?: unknown }) {
        super('CLEANUP', `Could not remove working directory '${path}': ${reason}`, options);
    }
}

export class SchemaMismatchError extends PipelineError {
    constructor(readonly column: string, readonly source: string) {
        super('SCHEMA_MISMATCH', `Column '${column}' is missing from ${source}`);
    }
}

export class UnknownLabelError extends PipelineError {
    constructor(readonly label: string, readonly known: string[]) {
        super('UNKNOWN_LABEL', `Label '${label}' is not one of the training classes [${known.join(', ')}]`);
    }
}

export class SerializationError extends PipelineError {
    constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
        super('SERIALIZATION', `Preprocessor at '${path}': ${reason}`, options);
    }
}

export class UpstreamArtifactMissingError extends PipelineError {
    constructor(readonly runId: string, readonly stageId: string) {
        super('UPSTREAM_ARTIFACT_MISSING', `Run '${runId}' has no artifact from stage '${stageId}'`);
    }
}

export class ArtifactOverwriteError extends PipelineError {
    constructor(readonly runId: string, readonly stageId: string) {
        super('ARTIFACT_OVERWRITE', `Run '${runId}' already holds an artifact from stage '${stageId}'`);
    }
}

export class DataReadError extends PipelineError {
    constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
        super('DATA_READ', `Could not read '${path}': ${reason}`, options);
    }
}

export class GraphDefinitionError extends PipelineError {
    constructor(message: string) {
        super('GRAPH_DEFINITION', message);
    }
}

export class ConfigError extends PipelineError {
    constructor(readonly issues: string[]) {
        super('CONFIG', `Invalid configuration:\n  ${issues.join('\n  ')}`);
    }
}

export class RunInProgressError extends PipelineError {
    constructor() {
        super('RUN_IN_PROGRESS', 'A preprocessing run is already active');
    }
}

export class PipelineRunError extends PipelineError {
    constructor(readonly report: RunReport) {
        const failed = Object.entries(report.tasks)
            .filter(([, state]) => state !== 'success')
            .map(([taskId, state]) => `${taskId} (${state})`);
        super('RUN_FAILED', `Run '${report.runId}' did not complete: ${failed.join(', ')}`);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string {
    return error instanceof PipelineError ? error.code : 'UNEXPECTED';
}
