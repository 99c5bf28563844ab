import { CsvOptions } from '../types';
import { readTable } from '../dataProcessing/csvParser';
import { requireColumns } from '../dataProcessing/collinearFilter';
import { featureColumns, splitColumnsByType } from '../dataProcessing/columnTypes';
import { selectCategoricalFeatures } from '../featureSelection/chiSquareSelector';
import { getClasses } from '../featureEngineering/labelEncoder';

export interface FeatureSelectionInputs {
    trainPath: string;
    indexColumn: string;
    targetColumn: string;
    significanceLevel: number;
    csv: CsvOptions;
}

// Only textual columns are candidates. Numeric columns skip the test and are
// all kept by the fit stage.
export async function executeFeaturePipeline(inputs: FeatureSelectionInputs): Promise<string[]> {
    const train = await readTable(inputs.trainPath, inputs.csv);
    requireColumns(train, [inputs.targetColumn], inputs.trainPath);

    const target = train.records.map(record => record[inputs.targetColumn]);
    const features = featureColumns(train.header, inputs.indexColumn, inputs.targetColumn);
    const { categoricalKeys } = splitColumnsByType(train.records, features);

    return selectCategoricalFeatures(train.records, target, categoricalKeys, inputs.significanceLevel);
}

export async function deriveClassMapping(trainPath: string, targetColumn: string, csv: CsvOptions): Promise<string[]> {
    const train = await readTable(trainPath, csv);
    requireColumns(train, [targetColumn], trainPath);
    return getClasses(train.records.map(record => record[targetColumn]));
}
