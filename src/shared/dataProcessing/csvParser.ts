import { readFile, writeFile } from 'fs/promises';
import * as csv from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { CsvOptions, Record, Table } from '../types';
import { DataReadError, errorMessage } from '../errors';

function isStringMatrix(value: unknown): value is string[][] {
    return Array.isArray(value) && value.every(row => Array.isArray(row) && row.every(cell => typeof cell === 'string'));
}

export function parseCSV(data: string, options: CsvOptions): Table {
    const rows: unknown = csv.parse(data, {
        delimiter: options.delimiter,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: false,
    });

    if (!isStringMatrix(rows) || rows.length === 0) {
        return { header: [], records: [] };
    }

    const [header, ...dataRows] = rows;
    const records = dataRows.map(row => {
        const record: Record = {};
        header.forEach((column, i) => {
            record[column] = row[i] ?? '';
        });
        return record;
    });

    return { header, records };
}

export function formatCSV(table: Table, options: CsvOptions): string {
    const rows = table.records.map(record => table.header.map(column => record[column] ?? ''));
    return stringify([table.header, ...rows], { delimiter: options.delimiter });
}

export async function readTable(path: string, options: CsvOptions): Promise<Table> {
    let data: string;
    try {
        data = await readFile(path, 'utf-8');
    } catch (error) {
        throw new DataReadError(path, errorMessage(error), { cause: error });
    }

    try {
        return parseCSV(data, options);
    } catch (error) {
        throw new DataReadError(path, errorMessage(error), { cause: error });
    }
}

export async function writeTable(path: string, table: Table, options: CsvOptions): Promise<void> {
    await writeFile(path, formatCSV(table, options));
}
