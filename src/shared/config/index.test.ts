import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { loadConfig, parseColumnList } from './index';

describe('loadConfig', () => {
    it('applies defaults and resolves directories against cwd', () => {
        const config = loadConfig({ TARGET_COLUMN: 'target' }, '/srv/pipeline');

        expect(config).toMatchObject({
            dataDir: '/srv/pipeline/data',
            outputDir: '/srv/pipeline/output',
            workRoot: '/srv/pipeline',
            targetColumn: 'target',
            indexColumn: 'id',
            collinearColumns: [],
            significanceLevel: 0.05,
            csv: { delimiter: ',' },
            onMissingColumn: 'error',
            onUnknownLabel: 'error',
            scheduleTime: { hour: 0, minute: 0 },
            port: 3000,
        });
        expect(config.variants.map(v => v.name)).toEqual(['standardized', 'minmax']);
    });

    it('reads explicit values', () => {
        const config = loadConfig(
            {
                TARGET_COLUMN: 'label',
                DATA_DIR: '/data/in',
                COLLINEAR_COLUMNS: ' total_charges, tenure_months ,,',
                SIGNIFICANCE_LEVEL: '0.01',
                CSV_DELIMITER: ';',
                ON_MISSING_COLUMN: 'ignore',
                ON_UNKNOWN_LABEL: 'sentinel',
                SCHEDULE_TIME: '02:30',
                PORT: '8080',
            },
            '/srv'
        );

        expect(config.dataDir).toBe('/data/in');
        expect(config.collinearColumns).toEqual(['total_charges', 'tenure_months']);
        expect(config.significanceLevel).toBe(0.01);
        expect(config.csv.delimiter).toBe(';');
        expect(config.onMissingColumn).toBe('ignore');
        expect(config.onUnknownLabel).toBe('sentinel');
        expect(config.scheduleTime).toEqual({ hour: 2, minute: 30 });
        expect(config.port).toBe(8080);
    });

    it('requires a target column', () => {
        expect(() => loadConfig({}, '/srv')).toThrow(ConfigError);
    });

    it('reports every invalid value', () => {
        try {
            loadConfig({ TARGET_COLUMN: 't', SCHEDULE_TIME: '25:00', ON_UNKNOWN_LABEL: 'skip' }, '/srv');
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (!(error instanceof ConfigError)) return;
            expect(error.issues).toHaveLength(2);
            expect(error.issues).toContain('SCHEDULE_TIME: SCHEDULE_TIME must be HH:MM');
        }
    });
});

describe('parseColumnList', () => {
    it('splits on commas and drops blanks', () => {
        expect(parseColumnList('a, b,,c ')).toEqual(['a', 'b', 'c']);
        expect(parseColumnList('')).toEqual([]);
    });
});
