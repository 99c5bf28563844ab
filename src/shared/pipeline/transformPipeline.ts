import { join } from 'path';
import { CsvOptions, Record, SPLITS, Split, SplitPaths, Table, UnknownLabelPolicy } from '../types';
import { PREPROCESSOR_FILE, SPLIT_FILES } from '../constants';
import { SerializationError } from '../errors';
import { readTable, writeTable } from '../dataProcessing/csvParser';
import { requireColumns } from '../dataProcessing/collinearFilter';
import { loadPreprocessor } from '../featureEngineering/preprocessor';
import { labelEncode } from '../featureEngineering/labelEncoder';
import { Logger, logWarning } from '../utils/logger';

export interface TransformInputs {
    splitPaths: SplitPaths;
    outputDirectory: string;
    featureNames: string[];
    classes: string[];
    indexColumn: string;
    targetColumn: string;
    csv: CsvOptions;
    onUnknownLabel: UnknownLabelPolicy;
    warnings: string[];
    logger?: Logger;
}

export function formatNumber(value: number): string {
    return Number.isNaN(value) ? '' : String(value);
}

function sameColumns(a: string[], b: string[]): boolean {
    return a.length === b.length && a.every((column, i) => column === b[i]);
}

/**
 * Applies the persisted preprocessor of one variant to every split. All three
 * outputs are built before any is written, so a failing split leaves the
 * variant directory without partial results.
 */
export async function executeTransformPipeline(inputs: TransformInputs): Promise<SplitPaths> {
    const preprocessorPath = join(inputs.outputDirectory, PREPROCESSOR_FILE);
    const preprocessor = await loadPreprocessor(preprocessorPath);

    if (!sameColumns(preprocessor.featureNames, inputs.featureNames)) {
        throw new SerializationError(preprocessorPath, 'output columns differ from the ones published at fit time');
    }

    const outputs: { split: Split; path: string; table: Table }[] = [];

    for (const split of SPLITS) {
        const source = inputs.splitPaths[split];
        const part = await readTable(source, inputs.csv);
        requireColumns(part, [inputs.indexColumn, inputs.targetColumn], source);

        const labels = labelEncode(
            part.records.map(record => record[inputs.targetColumn]),
            inputs.classes,
            inputs.onUnknownLabel,
            label => logWarning(`${split}: label '${label}' is not a training class; encoded as -1`, inputs.warnings, inputs.logger)
        );

        const { matrix, unknownCounts, invalidCounts } = preprocessor.transform(part.records);
        Object.entries(unknownCounts).forEach(([column, count]) => {
            logWarning(
                `${split}: ${count} value(s) of '${column}' were not seen in training; encoded as zeros`,
                inputs.warnings,
                inputs.logger
            );
        });
        Object.entries(invalidCounts).forEach(([column, count]) => {
            logWarning(
                `${split}: ${count} value(s) of numeric column '${column}' are not numbers; written as empty`,
                inputs.warnings,
                inputs.logger
            );
        });

        const values = matrix.to2DArray();
        const records = part.records.map((record, i) => {
            const out: Record = {
                [inputs.indexColumn]: record[inputs.indexColumn],
                [inputs.targetColumn]: String(labels[i]),
            };
            inputs.featureNames.forEach((column, j) => {
                out[column] = formatNumber(values[i][j]);
            });
            return out;
        });

        outputs.push({
            split,
            path: join(inputs.outputDirectory, SPLIT_FILES[split]),
            table: { header: [inputs.indexColumn, inputs.targetColumn, ...inputs.featureNames], records },
        });
    }

    const paths: SplitPaths = { train: '', validation: '', test: '' };
    for (const output of outputs) {
        await writeTable(output.path, output.table, inputs.csv);
        paths[output.split] = output.path;
    }
    return paths;
}
