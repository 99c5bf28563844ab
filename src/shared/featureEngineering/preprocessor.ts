import { readFile, writeFile } from 'fs/promises';
import { gunzipSync, gzipSync } from 'zlib';
import { Matrix } from 'ml-matrix';
import { z } from 'zod';
import { Record, ScalingMode } from '../types';
import { SerializationError, errorMessage } from '../errors';
import { OneHotState, fitOneHotEncoder, oneHotFeatureNames, transformOneHot } from './encodeCategorical';
import { ScalerState, fitScaler, transformScaler } from './scalers';

export const PREPROCESSOR_FORMAT = 'tabular-prep/preprocessor@1';

const persistedSchema = z.object({
    format: z.literal(PREPROCESSOR_FORMAT),
    oneHot: z.object({
        columns: z.array(z.string()),
        categories: z.record(z.array(z.string())),
    }),
    scaler: z.object({
        mode: z.enum(['standard', 'minmax', 'none']),
        columns: z.array(z.string()),
        offsets: z.array(z.number()),
        scales: z.array(z.number()),
    }),
});

type PersistedPreprocessor = z.infer<typeof persistedSchema>;

export interface TransformResult {
    matrix: Matrix;
    unknownCounts: { [column: string]: number };
    invalidCounts: { [column: string]: number };
}

/**
 * One-hot encoding for the categorical columns followed by scaling of the
 * numeric columns. Output columns are the categorical expansions first, then
 * the numeric columns in fit order.
 */
export class FeaturePreprocessor {
    constructor(readonly oneHot: OneHotState, readonly scaler: ScalerState) {}

    static fit(
        records: Record[],
        categoricalKeys: string[],
        numericalKeys: string[],
        mode: ScalingMode
    ): FeaturePreprocessor {
        return new FeaturePreprocessor(
            fitOneHotEncoder(records, categoricalKeys),
            fitScaler(records, numericalKeys, mode)
        );
    }

    get mode(): ScalingMode {
        return this.scaler.mode;
    }

    get featureNames(): string[] {
        return [...oneHotFeatureNames(this.oneHot), ...this.scaler.columns];
    }

    transform(records: Record[]): TransformResult {
        const encoded = transformOneHot(records, this.oneHot);
        const scaled = transformScaler(records, this.scaler);
        const width = this.featureNames.length;
        const matrix = Matrix.zeros(records.length, width);

        records.forEach((_, i) => {
            [...encoded.rows[i], ...scaled.rows[i]].forEach((value, j) => matrix.set(i, j, value));
        });

        return { matrix, unknownCounts: encoded.unknownCounts, invalidCounts: scaled.invalidCounts };
    }

    toJSON(): PersistedPreprocessor {
        return { format: PREPROCESSOR_FORMAT, oneHot: this.oneHot, scaler: this.scaler };
    }
}

export function serializePreprocessor(preprocessor: FeaturePreprocessor): Buffer {
    return gzipSync(Buffer.from(JSON.stringify(preprocessor.toJSON()), 'utf-8'));
}

export function deserializePreprocessor(payload: Buffer, source: string): FeaturePreprocessor {
    let parsed: unknown;
    try {
        parsed = JSON.parse(gunzipSync(payload).toString('utf-8'));
    } catch (error) {
        throw new SerializationError(source, `not a readable preprocessor (${errorMessage(error)})`, { cause: error });
    }

    const result = persistedSchema.safeParse(parsed);
    if (!result.success) {
        throw new SerializationError(source, `unexpected content (${result.error.issues[0]?.message ?? 'invalid'})`);
    }

    return new FeaturePreprocessor(result.data.oneHot, result.data.scaler);
}

export async function savePreprocessor(path: string, preprocessor: FeaturePreprocessor): Promise<void> {
    try {
        await writeFile(path, serializePreprocessor(preprocessor));
    } catch (error) {
        throw new SerializationError(path, `could not be written (${errorMessage(error)})`, { cause: error });
    }
}

export async function loadPreprocessor(path: string): Promise<FeaturePreprocessor> {
    let payload: Buffer;
    try {
        payload = await readFile(path);
    } catch (error) {
        throw new SerializationError(path, `could not be read (${errorMessage(error)})`, { cause: error });
    }
    return deserializePreprocessor(payload, path);
}
