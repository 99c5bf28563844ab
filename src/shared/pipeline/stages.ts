import { SplitPaths } from '../types';

export const STAGE = {
    createWorkingDirectory: 'createWorkingDirectory',
    readData: 'readData',
    selectFeatures: 'selectFeatures',
    deriveClasses: 'deriveClasses',
    removeWorkingDirectory: 'removeWorkingDirectory',
    purgeArtifacts: 'purgeArtifacts',
} as const;

export type OutputDirStageId = `createOutputDir.${string}`;
export type FitStageId = `fitPreprocessor.${string}`;
export type TransformStageId = `transform.${string}`;

export function outputDirStage(variant: string): OutputDirStageId {
    return `createOutputDir.${variant}`;
}

export function fitStage(variant: string): FitStageId {
    return `fitPreprocessor.${variant}`;
}

export function transformStage(variant: string): TransformStageId {
    return `transform.${variant}`;
}

/** Output of each stage, keyed by stage id. */
export interface PreprocessingArtifacts {
    createWorkingDirectory: string;
    readData: SplitPaths;
    selectFeatures: string[];
    deriveClasses: string[];
    [outputDir: OutputDirStageId]: string;
    [fit: FitStageId]: string[];
    [transform: TransformStageId]: SplitPaths;
}
