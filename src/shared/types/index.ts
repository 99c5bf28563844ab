export type Record = { [key: string]: string };

export interface Table {
    header: string[];
    records: Record[];
}

export const SPLITS = ['train', 'validation', 'test'] as const;

export type Split = typeof SPLITS[number];

export type SplitPaths = { [S in Split]: string };

export type ScalingMode = 'standard' | 'minmax' | 'none';

export type MissingColumnPolicy = 'error' | 'ignore';

export type UnknownLabelPolicy = 'error' | 'sentinel';

export interface CsvOptions {
    delimiter: string;
}

export interface Variant {
    name: string;
    scaling: ScalingMode;
}

export interface PipelineConfig {
    dataDir: string;
    outputDir: string;
    workRoot: string;
    targetColumn: string;
    indexColumn: string;
    collinearColumns: string[];
    significanceLevel: number;
    csv: CsvOptions;
    onMissingColumn: MissingColumnPolicy;
    onUnknownLabel: UnknownLabelPolicy;
    variants: Variant[];
    scheduleTime: { hour: number; minute: number };
    port: number;
}

export type TaskState = 'pending' | 'running' | 'success' | 'failed' | 'upstreamFailed' | 'cancelled';

export interface RunReport {
    runId: string;
    workingDirectory: string;
    status: 'success' | 'failed';
    startedAt: string;
    finishedAt: string;
    tasks: { [taskId: string]: TaskState };
    errors: { taskId: string; code: string; message: string }[];
    warnings: string[];
    outputs: { [variant: string]: SplitPaths };
}
