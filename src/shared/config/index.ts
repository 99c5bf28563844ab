import { resolve } from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { PipelineConfig } from '../types';
import { DEFAULT_VARIANTS } from '../constants';
import { ConfigError } from '../errors';

const envSchema = z.object({
    DATA_DIR: z.string().min(1).default('data'),
    OUTPUT_DIR: z.string().min(1).default('output'),
    WORK_ROOT: z.string().min(1).optional(),
    TARGET_COLUMN: z.string({ required_error: 'TARGET_COLUMN is required' }).min(1),
    INDEX_COLUMN: z.string().min(1).default('id'),
    COLLINEAR_COLUMNS: z.string().default(''),
    SIGNIFICANCE_LEVEL: z.coerce.number().gt(0).lt(1).default(0.05),
    CSV_DELIMITER: z.string().length(1).default(','),
    ON_MISSING_COLUMN: z.enum(['error', 'ignore']).default('error'),
    ON_UNKNOWN_LABEL: z.enum(['error', 'sentinel']).default('error'),
    SCHEDULE_TIME: z
        .string()
        .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'SCHEDULE_TIME must be HH:MM')
        .default('00:00'),
    PORT: z.coerce.number().int().positive().default(3000),
});

export function parseColumnList(value: string): string[] {
    return value
        .split(',')
        .map(column => column.trim())
        .filter(column => column.length > 0);
}

/**
 * Builds the pipeline configuration from environment variables. Relative
 * directories resolve against cwd.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): PipelineConfig {
    const result = envSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigError(result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }

    const parsed = result.data;
    const [hour, minute] = parsed.SCHEDULE_TIME.split(':').map(Number);

    return {
        dataDir: resolve(cwd, parsed.DATA_DIR),
        outputDir: resolve(cwd, parsed.OUTPUT_DIR),
        workRoot: resolve(cwd, parsed.WORK_ROOT ?? '.'),
        targetColumn: parsed.TARGET_COLUMN,
        indexColumn: parsed.INDEX_COLUMN,
        collinearColumns: parseColumnList(parsed.COLLINEAR_COLUMNS),
        significanceLevel: parsed.SIGNIFICANCE_LEVEL,
        csv: { delimiter: parsed.CSV_DELIMITER },
        onMissingColumn: parsed.ON_MISSING_COLUMN,
        onUnknownLabel: parsed.ON_UNKNOWN_LABEL,
        variants: DEFAULT_VARIANTS,
        scheduleTime: { hour, minute },
        port: parsed.PORT,
    };
}

/** Reads `.env` into process.env, then builds the configuration. */
export function loadConfigFromEnvironment(): PipelineConfig {
    loadDotenv();
    return loadConfig(process.env);
}
