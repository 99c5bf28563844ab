import { resolve } from 'path';
import { PipelineConfig, RunReport, SplitPaths, Variant } from '../types';
import { PipelineRunError, errorCode, errorMessage } from '../errors';
import { Logger, consoleLogger } from '../utils/logger';
import { ArtifactStore, RunArtifacts } from './artifactStore';
import { TaskGraph } from './taskGraph';
import { PreprocessingArtifacts, STAGE, fitStage, outputDirStage, transformStage } from './stages';
import { createWorkingDirectory, destroyWorkingDirectory, workingDirectoryName } from './workingDirectory';
import { deriveClassMapping, executeFeaturePipeline } from './featurePipeline';
import { executeDataPipeline } from './dataPipeline';
import { ensureOutputDirectory, executePreprocessorPipeline } from './preprocessorPipeline';
import { executeTransformPipeline } from './transformPipeline';

export const artifactStore = new ArtifactStore<PreprocessingArtifacts>();

export interface RunOptions {
    store?: ArtifactStore<PreprocessingArtifacts>;
    logger?: Logger;
    signal?: AbortSignal;
    now?: () => Date;
}

export interface RunContext {
    config: PipelineConfig;
    runId: string;
    workingDirectory: string;
    artifacts: RunArtifacts<PreprocessingArtifacts>;
    warnings: string[];
    outputs: { [variant: string]: SplitPaths };
    logger: Logger;
    now: Date;
}

/** Output-dir, fit and transform stages for one scaling variant. */
function addVariantStages(graph: TaskGraph, ctx: RunContext, variant: Variant): string {
    const { config, artifacts } = ctx;

    graph.addTask({
        id: outputDirStage(variant.name),
        dependsOn: [STAGE.readData],
        run: async () => {
            artifacts.publish(outputDirStage(variant.name), await ensureOutputDirectory(config.outputDir, variant.name));
        },
    });

    graph.addTask({
        id: fitStage(variant.name),
        dependsOn: [STAGE.selectFeatures, outputDirStage(variant.name)],
        run: async () => {
            const { featureNames } = await executePreprocessorPipeline({
                trainPath: artifacts.get(STAGE.readData).train,
                categoricalFeatures: artifacts.get(STAGE.selectFeatures),
                scaling: variant.scaling,
                outputDirectory: artifacts.get(outputDirStage(variant.name)),
                indexColumn: config.indexColumn,
                targetColumn: config.targetColumn,
                csv: config.csv,
            });
            ctx.logger.log(`   ${variant.name}: ${featureNames.length} output columns`);
            artifacts.publish(fitStage(variant.name), featureNames);
        },
    });

    graph.addTask({
        id: transformStage(variant.name),
        dependsOn: [fitStage(variant.name), STAGE.deriveClasses],
        run: async () => {
            const paths = await executeTransformPipeline({
                splitPaths: artifacts.get(STAGE.readData),
                outputDirectory: artifacts.get(outputDirStage(variant.name)),
                featureNames: artifacts.get(fitStage(variant.name)),
                classes: artifacts.get(STAGE.deriveClasses),
                indexColumn: config.indexColumn,
                targetColumn: config.targetColumn,
                csv: config.csv,
                onUnknownLabel: config.onUnknownLabel,
                warnings: ctx.warnings,
                logger: ctx.logger,
            });
            artifacts.publish(transformStage(variant.name), paths);
            ctx.outputs[variant.name] = paths;
        },
    });

    return transformStage(variant.name);
}

export function buildPreprocessingGraph(ctx: RunContext): TaskGraph {
    const { config, artifacts } = ctx;
    const graph = new TaskGraph();

    graph.addTask({
        id: STAGE.createWorkingDirectory,
        run: async () => {
            artifacts.publish(STAGE.createWorkingDirectory, await createWorkingDirectory(config.workRoot, ctx.now));
        },
    });

    graph.addTask({
        id: STAGE.readData,
        dependsOn: [STAGE.createWorkingDirectory],
        run: async () => {
            const paths = await executeDataPipeline({
                dataDir: config.dataDir,
                workingDirectory: artifacts.get(STAGE.createWorkingDirectory),
                collinearColumns: config.collinearColumns,
                onMissingColumn: config.onMissingColumn,
                indexColumn: config.indexColumn,
                targetColumn: config.targetColumn,
                csv: config.csv,
                warnings: ctx.warnings,
                logger: ctx.logger,
            });
            artifacts.publish(STAGE.readData, paths);
        },
    });

    graph.addTask({
        id: STAGE.selectFeatures,
        dependsOn: [STAGE.readData],
        run: async () => {
            const selected = await executeFeaturePipeline({
                trainPath: artifacts.get(STAGE.readData).train,
                indexColumn: config.indexColumn,
                targetColumn: config.targetColumn,
                significanceLevel: config.significanceLevel,
                csv: config.csv,
            });
            ctx.logger.log(`   selected categorical features: [${selected.join(', ')}]`);
            artifacts.publish(STAGE.selectFeatures, selected);
        },
    });

    graph.addTask({
        id: STAGE.deriveClasses,
        dependsOn: [STAGE.readData],
        run: async () => {
            const classes = await deriveClassMapping(artifacts.get(STAGE.readData).train, config.targetColumn, config.csv);
            artifacts.publish(STAGE.deriveClasses, classes);
        },
    });

    const variantTails = config.variants.map(variant => addVariantStages(graph, ctx, variant));

    graph.addTask({
        id: STAGE.removeWorkingDirectory,
        dependsOn: variantTails,
        trigger: 'allDone',
        run: async () => {
            const workingDirectory = artifacts.find(STAGE.createWorkingDirectory);
            if (workingDirectory === undefined) {
                ctx.logger.log('   no working directory was created; nothing to remove');
                return;
            }
            await destroyWorkingDirectory(workingDirectory);
        },
    });

    graph.addTask({
        id: STAGE.purgeArtifacts,
        dependsOn: [STAGE.removeWorkingDirectory],
        trigger: 'allDone',
        run: async () => {
            const removed = artifacts.purge();
            ctx.logger.log(`   purged ${removed} artifact(s) of ${ctx.runId}`);
        },
    });

    return graph;
}

/**
 * Runs the whole preprocessing graph once. Teardown stages run whatever the
 * outcome of the variants; a failed or cancelled run rejects with
 * PipelineRunError carrying the report.
 */
export async function runPreprocessing(config: PipelineConfig, options: RunOptions = {}): Promise<RunReport> {
    const store = options.store ?? artifactStore;
    const logger = options.logger ?? consoleLogger;
    const now = options.now?.() ?? new Date();
    const runId = workingDirectoryName(now);

    const ctx: RunContext = {
        config,
        runId,
        workingDirectory: resolve(config.workRoot, runId),
        artifacts: store.scope(runId),
        warnings: [],
        outputs: {},
        logger,
        now,
    };

    logger.log(`\n🚀 Preprocessing run ${runId}`);
    const startedAt = now.toISOString();

    const result = await buildPreprocessingGraph(ctx)
        .run({ signal: options.signal, logger })
        .finally(() => store.purge(runId));

    const tasks = result.states;
    const report: RunReport = {
        runId,
        workingDirectory: ctx.workingDirectory,
        status: Object.values(tasks).every(state => state === 'success') ? 'success' : 'failed',
        startedAt,
        finishedAt: new Date().toISOString(),
        tasks,
        errors: result.errors.map(({ taskId, error }) => ({
            taskId,
            code: errorCode(error),
            message: errorMessage(error),
        })),
        warnings: ctx.warnings,
        outputs: ctx.outputs,
    };

    if (report.status === 'failed') {
        logger.error(`Run ${runId} failed`);
        throw new PipelineRunError(report);
    }

    logger.success(`Run ${runId} finished with ${report.warnings.length} warning(s)`);
    return report;
}
