import { mkdir } from 'fs/promises';
import { join } from 'path';
import { CsvOptions, ScalingMode } from '../types';
import { PREPROCESSOR_FILE } from '../constants';
import { readTable } from '../dataProcessing/csvParser';
import { requireColumns } from '../dataProcessing/collinearFilter';
import { featureColumns, splitColumnsByType } from '../dataProcessing/columnTypes';
import { FeaturePreprocessor, savePreprocessor } from '../featureEngineering/preprocessor';

export async function ensureOutputDirectory(outputRoot: string, variantName: string): Promise<string> {
    const path = join(outputRoot, variantName);
    await mkdir(path, { recursive: true });
    return path;
}

export interface FitInputs {
    trainPath: string;
    categoricalFeatures: string[];
    scaling: ScalingMode;
    outputDirectory: string;
    indexColumn: string;
    targetColumn: string;
    csv: CsvOptions;
}

export interface FitResult {
    preprocessor: FeaturePreprocessor;
    featureNames: string[];
    numericalKeys: string[];
    path: string;
}

/**
 * Fits the variant's preprocessor on train and writes it beside the variant's
 * outputs. Numeric columns are recomputed by type, independent of selection.
 */
export async function executePreprocessorPipeline(inputs: FitInputs): Promise<FitResult> {
    const train = await readTable(inputs.trainPath, inputs.csv);
    requireColumns(train, [inputs.targetColumn, ...inputs.categoricalFeatures], inputs.trainPath);

    const features = featureColumns(train.header, inputs.indexColumn, inputs.targetColumn);
    const { numericalKeys } = splitColumnsByType(train.records, features);

    const preprocessor = FeaturePreprocessor.fit(train.records, inputs.categoricalFeatures, numericalKeys, inputs.scaling);
    const path = join(inputs.outputDirectory, PREPROCESSOR_FILE);
    await savePreprocessor(path, preprocessor);

    return { preprocessor, featureNames: preprocessor.featureNames, numericalKeys, path };
}
