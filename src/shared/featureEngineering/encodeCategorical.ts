import { Record } from '../types';

export interface OneHotState {
    columns: string[];
    categories: { [column: string]: string[] };
}

export function compareCodeUnits(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function fitOneHotEncoder(records: Record[], categoricalKeys: string[]): OneHotState {
    const categories: { [column: string]: string[] } = {};

    categoricalKeys.forEach(key => {
        categories[key] = [...new Set(records.map(record => record[key] ?? ''))].sort(compareCodeUnits);
    });

    return { columns: [...categoricalKeys], categories };
}

export function oneHotFeatureNames(state: OneHotState): string[] {
    return state.columns.flatMap(key => state.categories[key].map(category => `${key}_${category}`));
}

/**
 * Categories absent from the fitted state encode as all zeros; the number of
 * such cells per column is returned so the caller can report it.
 */
export function transformOneHot(
    records: Record[],
    state: OneHotState
): { rows: number[][]; unknownCounts: { [column: string]: number } } {
    const unknownCounts: { [column: string]: number } = {};

    const rows = records.map(record =>
        state.columns.flatMap(key => {
            const value = record[key] ?? '';
            const known = state.categories[key];
            if (!known.includes(value)) {
                unknownCounts[key] = (unknownCounts[key] ?? 0) + 1;
            }
            return known.map(category => (category === value ? 1 : 0));
        })
    );

    return { rows, unknownCounts };
}
