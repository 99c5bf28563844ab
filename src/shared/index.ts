export * from './types';
export * from './errors';
export * from './constants';
export { loadConfig, loadConfigFromEnvironment } from './config';
export { consoleLogger, silentLogger, logWarning } from './utils/logger';
export type { Logger } from './utils/logger';
export { ArtifactStore, RunArtifacts } from './pipeline/artifactStore';
export { TaskGraph } from './pipeline/taskGraph';
export type { TaskDefinition, TriggerRule } from './pipeline/taskGraph';
export { createWorkingDirectory, destroyWorkingDirectory, withWorkingDirectory } from './pipeline/workingDirectory';
export { artifactStore, buildPreprocessingGraph, runPreprocessing } from './pipeline/orchestrator';
export type { RunOptions } from './pipeline/orchestrator';
export type { PreprocessingArtifacts } from './pipeline/stages';
export { FeaturePreprocessor, loadPreprocessor, savePreprocessor } from './featureEngineering/preprocessor';
export { getClasses, labelEncode } from './featureEngineering/labelEncoder';
export { selectCategoricalFeatures } from './featureSelection/chiSquareSelector';
export { RunCoordinator } from './scheduling/coordinator';
export { DailySchedule, nextOccurrence } from './scheduling/dailySchedule';
