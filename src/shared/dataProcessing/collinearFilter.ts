import { MissingColumnPolicy, Table } from '../types';
import { SchemaMismatchError } from '../errors';
import { Logger, logWarning } from '../utils/logger';

export function requireColumns(table: Table, columns: string[], source: string): void {
    for (const column of columns) {
        if (!table.header.includes(column)) {
            throw new SchemaMismatchError(column, source);
        }
    }
}

export function dropCollinearColumns(
    table: Table,
    collinearColumns: string[],
    policy: MissingColumnPolicy,
    source: string,
    warnings: string[],
    logger?: Logger
): Table {
    const toDrop = collinearColumns.filter(column => {
        if (table.header.includes(column)) return true;
        if (policy === 'error') {
            throw new SchemaMismatchError(column, source);
        }
        logWarning(`Collinear column '${column}' is not in ${source}; nothing to drop.`, warnings, logger);
        return false;
    });

    const header = table.header.filter(column => !toDrop.includes(column));
    const records = table.records.map(record => {
        const updatedRecord = { ...record };
        toDrop.forEach(column => {
            delete updatedRecord[column];
        });
        return updatedRecord;
    });

    return { header, records };
}
