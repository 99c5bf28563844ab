import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DataReadError } from '../errors';
import { formatCSV, parseCSV, readTable, writeTable } from './csvParser';

const comma = { delimiter: ',' };

describe('parseCSV', () => {
    it('keeps header order and maps rows to records', () => {
        const table = parseCSV('id,color,size\n1,red,3\n2,blue,4\n', comma);

        expect(table.header).toEqual(['id', 'color', 'size']);
        expect(table.records).toEqual([
            { id: '1', color: 'red', size: '3' },
            { id: '2', color: 'blue', size: '4' },
        ]);
    });

    it('honours the configured delimiter', () => {
        const table = parseCSV('id;value\n1;2,5\n', { delimiter: ';' });

        expect(table.records).toEqual([{ id: '1', value: '2,5' }]);
    });

    it('strips a leading byte-order mark from the first header', () => {
        const table = parseCSV('\uFEFFid,target\n1,yes\n', comma);

        expect(table.header).toEqual(['id', 'target']);
        expect(table.records).toEqual([{ id: '1', target: 'yes' }]);
    });

    it('returns an empty table for empty input', () => {
        expect(parseCSV('', comma)).toEqual({ header: [], records: [] });
    });
});

describe('formatCSV', () => {
    it('writes the header first and quotes values containing the delimiter', () => {
        const csv = formatCSV(
            { header: ['id', 'note'], records: [{ id: '1', note: 'a,b' }, { id: '2', note: '' }] },
            comma
        );

        expect(csv).toBe('id,note\n1,"a,b"\n2,\n');
    });
});

describe('readTable / writeTable', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'csv-'));
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('writes a table that reads back unchanged', async () => {
        const path = join(dir, 'table.csv');
        const table = { header: ['id', 'v'], records: [{ id: '7', v: 'x' }] };

        await writeTable(path, table, comma);

        expect(await readFile(path, 'utf-8')).toBe('id,v\n7,x\n');
        expect(await readTable(path, comma)).toEqual(table);
    });

    it('reads a spreadsheet export saved with a byte-order mark', async () => {
        const path = join(dir, 'export.csv');
        await writeFile(path, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('id,target\n1,yes\n')]));

        const table = await readTable(path, comma);

        expect(table.header).toEqual(['id', 'target']);
    });

    it('raises DataReadError for a missing file', async () => {
        await expect(readTable(join(dir, 'missing.csv'), comma)).rejects.toThrow(DataReadError);
    });

    it('raises DataReadError for rows with the wrong column count', async () => {
        const path = join(dir, 'ragged.csv');
        await writeFile(path, 'a,b\n1,2,3\n');

        await expect(readTable(path, comma)).rejects.toThrow(DataReadError);
    });
});
