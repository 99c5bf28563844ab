import { UnknownLabelPolicy } from '../types';
import { UnknownLabelError } from '../errors';
import { isNumericValue } from '../dataProcessing/columnTypes';
import { compareCodeUnits } from './encodeCategorical';

export const UNKNOWN_LABEL = -1;

/**
 * Sorted distinct labels. Labels that are all numeric sort by value, anything
 * else sorts by code unit.
 */
export function getClasses(values: string[]): string[] {
    const unique = [...new Set(values)];
    if (unique.length > 0 && unique.every(isNumericValue)) {
        return unique.sort((a, b) => Number(a) - Number(b));
    }
    return unique.sort(compareCodeUnits);
}

export function labelEncode(
    values: string[],
    classes: string[],
    policy: UnknownLabelPolicy = 'error',
    onUnknown?: (label: string) => void
): number[] {
    const lookup = new Map(classes.map((label, i) => [label, i]));

    return values.map(value => {
        const encoded = lookup.get(value);
        if (encoded !== undefined) return encoded;
        if (policy === 'error') {
            throw new UnknownLabelError(value, classes);
        }
        onUnknown?.(value);
        return UNKNOWN_LABEL;
    });
}
