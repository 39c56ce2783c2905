/**
 * Document generation routes.
 *
 * POST /generate      render the card HTML and convert it to PDF through DocRaptor
 * POST /preview-html  return the card HTML without calling DocRaptor
 */
import express, { type Response } from 'express';
import { computeLayout, InvalidConfigurationError } from '../../../shared/cardLayout.js';
import type { GenerationSettings } from '../../../shared/types.js';
import type { ServerConfig } from '../config.js';
import { renderCardHtml } from '../render/cardHtml.js';
import { createDocRaptorClient, RenderServiceError } from '../services/docRaptorClient.js';
import { readIccProfileBase64 } from '../services/iccProfiles.js';
import { debugLog, formatBase64Size } from '../utils/debug.js';
import { isRecord, outputFilename, parseGenerationSettings, SettingsError, toFlag } from '../utils/settings.js';
import { collectAdditionalImages, decodeIccUpload, decodeImageUpload, UploadError } from '../utils/uploadUtils.js';

export interface PreparedDocument {
    html: string;
    settings: GenerationSettings;
}

/** Errors caused by the request itself, reported back as 400. */
function isClientError(err: unknown): err is Error {
    return err instanceof UploadError
        || err instanceof SettingsError
        || err instanceof InvalidConfigurationError;
}

async function resolveIccProfile(body: Record<string, unknown>, iccDir: string): Promise<string | undefined> {
    // A freshly uploaded profile wins over a selected one; uploads are never stored
    const uploaded = decodeIccUpload(body.iccFile);
    if (uploaded) return uploaded;

    if (typeof body.iccProfile === 'string' && body.iccProfile !== '') {
        return (await readIccProfileBase64(iccDir, body.iccProfile)) ?? undefined;
    }
    return undefined;
}

export async function prepareDocument(body: Record<string, unknown>, config: ServerConfig): Promise<PreparedDocument> {
    const front = decodeImageUpload(body.image);
    const iccBase64 = await resolveIccProfile(body, config.iccProfilesDir);
    const settings = parseGenerationSettings(body, { iccBase64 });

    const additional = collectAdditionalImages(body, settings.cardType, toFlag(body.provideAllImages));
    const layout = computeLayout(settings.cardType, settings.bleed, settings.fitMode);

    debugLog(
        `[Generate] ${settings.cardType} card, front ${formatBase64Size(front.data)}`,
        `bleed=${settings.bleed} fit=${settings.fitMode} profile=${settings.pdfProfile || 'none'}`,
        `icc=${iccBase64 ? 'yes' : 'no'} back=${additional.back ? 'yes' : 'no'} inside=${additional.inside ? 'yes' : 'no'}`,
    );

    const html = renderCardHtml(layout, { front, back: additional.back, inside: additional.inside }, settings);
    return { html, settings };
}

function sendPrepareError(res: Response, err: unknown, tag: string): void {
    if (isClientError(err)) {
        res.status(400).json({ error: err.message });
        return;
    }
    console.error(`[${tag}] Error preparing document:`, err);
    res.status(500).json({ error: 'Failed to prepare document' });
}

export function createGenerateRouter(config: ServerConfig): express.Router {
    const router = express.Router();

    router.post('/generate', async (req, res) => {
        const body = isRecord(req.body) ? req.body : {};

        const apiKey = typeof body.apiKey === 'string' ? body.apiKey.trim() : '';
        if (!apiKey) {
            res.status(400).json({ error: 'DocRaptor API key is required' });
            return;
        }

        let prepared: PreparedDocument;
        try {
            prepared = await prepareDocument(body, config);
        } catch (err) {
            sendPrepareError(res, err, 'Generate');
            return;
        }

        const client = createDocRaptorClient({
            apiKey,
            baseUrl: config.docRaptorApiUrl,
            timeoutMs: config.docRaptorTimeoutMs,
        });

        try {
            const pdf = await client.createPdf(prepared.html, prepared.settings);
            const filename = outputFilename(prepared.settings.pdfProfile);
            console.log(`[Generate] Created ${filename} (${pdf.length} bytes)`);

            res.status(200);
            res.type('application/pdf');
            res.attachment(filename);
            res.send(pdf);
        } catch (err) {
            if (err instanceof RenderServiceError) {
                res.status(500).json({ error: `DocRaptor API error: ${err.message}` });
                return;
            }
            console.error('[Generate] Unexpected error:', err);
            res.status(500).json({ error: 'Failed to generate PDF' });
        }
    });

    router.post('/preview-html', async (req, res) => {
        const body = isRecord(req.body) ? req.body : {};
        try {
            const { html } = await prepareDocument(body, config);
            res.json({ html });
        } catch (err) {
            sendPrepareError(res, err, 'Preview');
        }
    });

    return router;
}
