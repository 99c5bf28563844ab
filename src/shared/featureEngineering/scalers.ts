import { Record, ScalingMode } from '../types';
import { mean, populationVariance } from '../utils/statistics';

/** Per-column affine map: scaled = (value - offset) / scale. */
export interface ScalerState {
    mode: ScalingMode;
    columns: string[];
    offsets: number[];
    scales: number[];
}

export interface ScaledRows {
    rows: number[][];
    invalidCounts: { [column: string]: number };
}

function isBlank(value: string | undefined): boolean {
    return value === undefined || value.trim() === '';
}

/** Blank and non-finite cells both read as NaN. */
export function parseNumeric(value: string | undefined): number {
    if (isBlank(value)) return NaN;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : NaN;
}

function observedValues(records: Record[], column: string): number[] {
    return records.map(record => parseNumeric(record[column])).filter(value => !isNaN(value));
}

function fitColumn(mode: ScalingMode, values: number[]): { offset: number; scale: number } {
    if (mode === 'none' || values.length === 0) {
        return { offset: 0, scale: 1 };
    }

    if (mode === 'standard') {
        const std = Math.sqrt(populationVariance(values));
        return { offset: mean(values), scale: std === 0 ? 1 : std };
    }

    const { min, max } = values.reduce(
        (range, value) => ({ min: Math.min(range.min, value), max: Math.max(range.max, value) }),
        { min: Infinity, max: -Infinity }
    );
    return { offset: min, scale: max - min === 0 ? 1 : max - min };
}

export function fitScaler(records: Record[], numericalKeys: string[], mode: ScalingMode): ScalerState {
    const fitted = numericalKeys.map(key => fitColumn(mode, observedValues(records, key)));

    return {
        mode,
        columns: [...numericalKeys],
        offsets: fitted.map(f => f.offset),
        scales: fitted.map(f => f.scale),
    };
}

/**
 * Missing values stay NaN. Non-blank cells that do not parse as numbers also
 * become NaN and are counted per column in `invalidCounts`.
 */
export function transformScaler(records: Record[], state: ScalerState): ScaledRows {
    const invalidCounts: { [column: string]: number } = {};

    const rows = records.map(record =>
        state.columns.map((key, i) => {
            const value = parseNumeric(record[key]);
            if (isNaN(value) && !isBlank(record[key])) {
                invalidCounts[key] = (invalidCounts[key] ?? 0) + 1;
            }
            return (value - state.offsets[i]) / state.scales[i];
        })
    );

    return { rows, invalidCounts };
}
