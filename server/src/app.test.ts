import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import request from 'supertest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createApp } from './app.js';
import type { ServerConfig } from './config.js';

describe('createApp', () => {
    let config: ServerConfig;

    beforeAll(() => {
        const iccProfilesDir = fs.mkdtempSync(path.join(os.tmpdir(), 'app-icc-'));
        fs.writeFileSync(path.join(iccProfilesDir, 'Coated.icc'), 'icc-bytes');
        config = {
            port: 0,
            host: '127.0.0.1',
            iccProfilesDir,
            docRaptorApiUrl: 'https://docraptor.test',
            docRaptorTimeoutMs: 5000,
            maxBodySize: '1kb',
        };
    });

    afterAll(() => {
        fs.rmSync(config.iccProfilesDir, { recursive: true, force: true });
    });

    it('should serve the configuration form', async () => {
        const res = await request(createApp(config)).get('/');

        expect(res.status).toBe(200);
        expect(res.headers['content-type']).toBe('text/html; charset=utf-8');
        expect(res.text).toContain('<option value="PDF/X-4" selected>PDF/X-4</option>');
        expect(res.text).toContain('<option value="">Default (no profile)</option>');
        expect(res.text).toContain('<option value="Coated.icc">Coated</option>');
    });

    it('should list ICC profiles', async () => {
        const res = await request(createApp(config)).get('/api/icc-profiles');

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ profiles: [{ filename: 'Coated.icc', name: 'Coated' }] });
    });

    it('should mount the layout route', async () => {
        const res = await request(createApp(config)).post('/api/layout').send({ cardType: 'folded' });

        expect(res.status).toBe(200);
        expect(res.body.layout.sheetKind).toBe('spread');
    });

    it('should return 413 for oversized bodies', async () => {
        const res = await request(createApp(config))
            .post('/preview-html')
            .send({ image: { filename: 'front.png', data: 'A'.repeat(4096) } });

        expect(res.status).toBe(413);
        expect(res.body.error).toBe('Request too large');
    });

    it('should return 400 for malformed JSON', async () => {
        const res = await request(createApp(config))
            .post('/preview-html')
            .set('Content-Type', 'application/json')
            .send('{"image":');

        expect(res.status).toBe(400);
        expect(res.body.error).toBe('Malformed request body');
    });
});
