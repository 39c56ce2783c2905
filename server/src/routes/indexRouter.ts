import express from 'express';
import { PDF_PROFILES } from '../../../shared/constants.js';
import { renderIndexPage } from '../render/indexPage.js';
import { listIccProfiles } from '../services/iccProfiles.js';

/**
 * GET /
 * Configuration form, prefilled with the PDF profiles and the ICC library.
 */
export function createIndexRouter(iccProfilesDir: string): express.Router {
    const router = express.Router();

    router.get('/', async (_req, res) => {
        try {
            const iccProfiles = await listIccProfiles(iccProfilesDir);
            res.type('html').send(renderIndexPage({ pdfProfiles: PDF_PROFILES, iccProfiles }));
        } catch (error) {
            console.error('[Index] Error rendering page:', error);
            res.status(500).send('Failed to load page');
        }
    });

    return router;
}
