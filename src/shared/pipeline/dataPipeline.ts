import { join } from 'path';
import { CsvOptions, MissingColumnPolicy, SPLITS, SplitPaths } from '../types';
import { SPLIT_FILES } from '../constants';
import { readTable, writeTable } from '../dataProcessing/csvParser';
import { dropCollinearColumns, requireColumns } from '../dataProcessing/collinearFilter';
import { Logger } from '../utils/logger';

export interface CleaningInputs {
    dataDir: string;
    workingDirectory: string;
    collinearColumns: string[];
    onMissingColumn: MissingColumnPolicy;
    indexColumn: string;
    targetColumn: string;
    csv: CsvOptions;
    warnings: string[];
    logger?: Logger;
}

/**
 * Reads each raw split, drops the collinear columns and writes the cleaned
 * copy into the working directory under the same file name.
 */
export async function executeDataPipeline(inputs: CleaningInputs): Promise<SplitPaths> {
    const paths: SplitPaths = { train: '', validation: '', test: '' };

    for (const split of SPLITS) {
        const source = join(inputs.dataDir, SPLIT_FILES[split]);
        const destination = join(inputs.workingDirectory, SPLIT_FILES[split]);

        const table = await readTable(source, inputs.csv);
        requireColumns(table, [inputs.indexColumn, inputs.targetColumn], source);

        const cleaned = dropCollinearColumns(
            table,
            inputs.collinearColumns,
            inputs.onMissingColumn,
            source,
            inputs.warnings,
            inputs.logger
        );
        await writeTable(destination, cleaned, inputs.csv);

        inputs.logger?.log(`   ${split}: ${cleaned.records.length} rows, ${cleaned.header.length} columns`);
        paths[split] = destination;
    }

    return paths;
}
