import express from 'express';
import { computeLayout, InvalidConfigurationError } from '../../../shared/cardLayout.js';
import { isRecord, toFlag } from '../utils/settings.js';

export const layoutRouter = express.Router();

/**
 * POST /api/layout
 * Compute the imposition for a card without rendering it.
 * Request body: { cardType?: 'flat' | 'folded', bleed?: boolean, fitMode?: 'cover' | 'contain' | 'fill' }
 * Response: { layout: CardLayout }
 */
layoutRouter.post('/', (req, res) => {
    const body = isRecord(req.body) ? req.body : {};

    try {
        const layout = computeLayout(body.cardType ?? 'flat', toFlag(body.bleed), body.fitMode ?? 'cover');
        res.json({ layout });
    } catch (err) {
        if (err instanceof InvalidConfigurationError) {
            res.status(400).json({ error: err.message });
            return;
        }
        console.error('[Layout] Error computing layout:', err);
        res.status(500).json({ error: 'Failed to compute layout' });
    }
});
