// tests/unit/module_store.test.ts

import fs from 'fs';
import path from 'path';
import { ModuleStore } from '../../src/infrastructure/storage/ModuleStore';
import { ModuleRecord } from '../../src/core/modules/types';
import { makeStorageDir, removeStorageDir } from '../helpers';

const RECORD: ModuleRecord = {
    id: '3f2b8c1e-9d4a-4e7b-8a6f-1c2d3e4f5a6b',
    metadata: { sourceName: 'A', scriptURL: 'http://x/s1', version: '1', region: 'eu' },
    localPath: '7a1c9e2b-5d3f-4b8a-9c6e-0f1a2b3c4d5e.js',
    metadataURL: 'http://x/meta1',
    isActive: false,
};

describe('ModuleStore', () => {
    let dir: string;
    let store: ModuleStore;

    beforeEach(() => {
        dir = makeStorageDir();
        store = new ModuleStore(dir);
    });

    afterEach(() => {
        removeStorageDir(dir);
    });

    it('should live at <storageDir>/modules.json', () => {
        expect(store.filePath).toBe(path.join(dir, 'modules.json'));
    });

    it('should report a missing file', async () => {
        expect(await store.read()).toEqual({ status: 'missing' });
    });

    it('should read back what it wrote', async () => {
        expect(await store.write([RECORD])).toEqual({ status: 'saved' });

        expect(await store.read()).toEqual({ status: 'loaded', records: [RECORD] });
    });

    it('should default a missing active flag to false', async () => {
        const { isActive, ...withoutFlag } = RECORD;
        expect(isActive).toBe(false);
        fs.writeFileSync(store.filePath, JSON.stringify([withoutFlag]));

        expect(await store.read()).toEqual({ status: 'loaded', records: [RECORD] });
    });

    it('should refuse a local path that escapes the storage directory', async () => {
        fs.writeFileSync(store.filePath, JSON.stringify([{ ...RECORD, localPath: '../outside.js' }]));

        const result = await store.read();

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error.code).toBe('PARSE_ERROR');
            expect(result.error.message).toContain('0.localPath: localPath must be a plain file name');
        }
    });

    it('should refuse two records with the same metadata URL', async () => {
        const twin = { ...RECORD, id: '9b8a7c6d-5e4f-4a3b-8c2d-1e0f9a8b7c6d', localPath: 'twin.js' };
        fs.writeFileSync(store.filePath, JSON.stringify([RECORD, twin]));

        const result = await store.read();

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error.code).toBe('PARSE_ERROR');
            expect(result.error.message).toContain('1.metadataURL: Duplicate metadata URL http://x/meta1');
        }
    });

    it('should refuse two records with the same id', async () => {
        const twin = { ...RECORD, metadataURL: 'http://x/meta2', localPath: 'twin.js' };
        fs.writeFileSync(store.filePath, JSON.stringify([RECORD, twin]));

        const result = await store.read();

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error.message).toContain(`1.id: Duplicate module id ${RECORD.id}`);
        }
    });

    it('should report malformed JSON as a parse failure', async () => {
        fs.writeFileSync(store.filePath, '[{');

        const result = await store.read();

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error.code).toBe('PARSE_ERROR');
        }
    });

    it('should report an unwritable file instead of throwing', async () => {
        fs.mkdirSync(store.filePath);

        const result = await store.write([RECORD]);

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error.code).toBe('IO_ERROR');
        }
    });

    it('should report an unreadable file as an IO failure', async () => {
        fs.mkdirSync(store.filePath);

        const result = await store.read();

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error.code).toBe('IO_ERROR');
        }
    });
});
