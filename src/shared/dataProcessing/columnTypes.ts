import { Record } from '../types';

export function isNumericValue(value: string): boolean {
    return value.trim() !== '' && Number.isFinite(Number(value));
}

/**
 * A column is numeric when it has at least one value and every non-empty value
 * parses as a finite number. Empty cells are treated as missing, not as text.
 */
export function isNumericColumn(records: Record[], column: string): boolean {
    let seen = 0;
    for (const record of records) {
        const value = record[column] ?? '';
        if (value.trim() === '') continue;
        if (!isNumericValue(value)) return false;
        seen++;
    }
    return seen > 0;
}

export function splitColumnsByType(
    records: Record[],
    columns: string[]
): { numericalKeys: string[]; categoricalKeys: string[] } {
    const numericalKeys = columns.filter(column => isNumericColumn(records, column));
    const categoricalKeys = columns.filter(column => !numericalKeys.includes(column));
    return { numericalKeys, categoricalKeys };
}

export function featureColumns(header: string[], indexColumn: string, targetColumn: string): string[] {
    return header.filter(column => column !== indexColumn && column !== targetColumn);
}
