import express from 'express';
import { listIccProfiles } from '../services/iccProfiles.js';

/**
 * GET /api/icc-profiles
 * Response: { profiles: Array<{ filename, name }> }
 */
export function createIccProfileRouter(iccProfilesDir: string): express.Router {
    const router = express.Router();

    router.get('/', async (_req, res) => {
        try {
            const profiles = await listIccProfiles(iccProfilesDir);
            res.json({ profiles });
        } catch (error) {
            console.error('[ICC] Error listing profiles:', error);
            res.status(500).json({ error: 'Failed to list ICC profiles' });
        }
    });

    return router;
}
