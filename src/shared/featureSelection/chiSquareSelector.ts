import { Record } from '../types';
import { chiSquareSurvival } from '../utils/statistics';

export interface ChiSquareResult {
    statistic: number;
    degreesOfFreedom: number;
    pValue: number;
}

/**
 * Pearson's chi-square test of independence between two categorical vectors,
 * without continuity correction.
 */
export function chiSquareIndependence(feature: string[], target: string[]): ChiSquareResult {
    if (feature.length !== target.length) {
        throw new Error(`Feature has ${feature.length} values but target has ${target.length}`);
    }

    const categories = [...new Set(feature)];
    const labels = [...new Set(target)];
    const observed = categories.map(() => labels.map(() => 0));

    feature.forEach((category, i) => {
        observed[categories.indexOf(category)][labels.indexOf(target[i])]++;
    });

    const n = feature.length;
    const rowTotals = observed.map(row => row.reduce((a, b) => a + b, 0));
    const columnTotals = labels.map((_, j) => observed.reduce((acc, row) => acc + row[j], 0));

    let statistic = 0;
    observed.forEach((row, i) => {
        row.forEach((count, j) => {
            const expected = (rowTotals[i] * columnTotals[j]) / n;
            statistic += Math.pow(count - expected, 2) / expected;
        });
    });

    const degreesOfFreedom = (categories.length - 1) * (labels.length - 1);
    const pValue = degreesOfFreedom > 0 ? chiSquareSurvival(statistic, degreesOfFreedom) : 1;

    return { statistic, degreesOfFreedom, pValue };
}

/**
 * Keeps the candidate columns whose association with the target is
 * significant at the given level. Order follows the candidate list.
 */
export function selectCategoricalFeatures(
    records: Record[],
    target: string[],
    candidates: string[],
    significanceLevel: number
): string[] {
    return candidates.filter(column => {
        const values = records.map(record => record[column] ?? '');
        if (new Set(values).size < 2) return false;
        return chiSquareIndependence(values, target).pValue < significanceLevel;
    });
}
