import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { listIccProfiles, readIccProfileBase64 } from './iccProfiles.js';

describe('iccProfiles', () => {
    let dir: string;

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'icc-profiles-'));
        fs.writeFileSync(path.join(dir, 'zeta.icc'), 'zeta-bytes');
        fs.writeFileSync(path.join(dir, 'Alpha.ICC'), 'alpha-bytes');
        fs.writeFileSync(path.join(dir, 'beta.icc'), 'icc-bytes');
        fs.writeFileSync(path.join(dir, 'notes.txt'), 'not a profile');
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe('listIccProfiles', () => {
        it('should list .icc files sorted by name', async () => {
            expect(await listIccProfiles(dir)).toEqual([
                { filename: 'Alpha.ICC', name: 'Alpha' },
                { filename: 'beta.icc', name: 'beta' },
                { filename: 'zeta.icc', name: 'zeta' },
            ]);
        });

        it('should return an empty list for a missing directory', async () => {
            expect(await listIccProfiles(path.join(dir, 'missing'))).toEqual([]);
        });
    });

    describe('readIccProfileBase64', () => {
        const expected = Buffer.from('icc-bytes').toString('base64');

        it('should add the .icc suffix when missing', async () => {
            expect(await readIccProfileBase64(dir, 'beta')).toBe(expected);
        });

        it('should read a name that already has the suffix', async () => {
            expect(await readIccProfileBase64(dir, 'beta.icc')).toBe(expected);
            expect(await readIccProfileBase64(dir, 'Alpha.ICC')).toBe(Buffer.from('alpha-bytes').toString('base64'));
        });

        it('should return null for unknown or empty names', async () => {
            expect(await readIccProfileBase64(dir, 'missing')).toBeNull();
            expect(await readIccProfileBase64(dir, '')).toBeNull();
        });

        it('should refuse names that leave the directory', async () => {
            expect(await readIccProfileBase64(dir, '../beta')).toBeNull();
            expect(await readIccProfileBase64(dir, 'sub/beta')).toBeNull();
        });
    });
});
