/**
 * DocRaptor client.
 *
 * Submits rendered HTML to DocRaptor (Prince engine) and returns the PDF bytes.
 * A single request per document; retries are left to the caller.
 */
import axios, { type AxiosInstance } from 'axios';
import type { GenerationSettings } from '../../../shared/types.js';
import { debugLog } from '../utils/debug.js';

export const DOCUMENT_NAME = 'docraptor-test.pdf';
export const PRINT_DPI = 300;

export interface RenderServiceConfig {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
}

export class RenderServiceError extends Error {
    readonly status: number | undefined;

    constructor(message: string, status?: number) {
        super(message);
        this.name = 'RenderServiceError';
        this.status = status;
    }
}

export interface PrinceOptions {
    css_dpi: number;
    profile?: string;
    pdf_version?: string;
    force_identity_encoding?: boolean;
}

export interface DocRequest {
    name: string;
    document_type: 'pdf';
    document_content: string;
    test: boolean;
    prince_options: PrinceOptions;
}

export interface DocRaptorClient {
    createPdf(html: string, settings: GenerationSettings): Promise<Buffer>;
}

export function buildDocRequest(html: string, settings: GenerationSettings): DocRequest {
    const princeOptions: PrinceOptions = { css_dpi: PRINT_DPI };

    if (settings.pdfProfile) {
        princeOptions.profile = settings.pdfProfile;
    }
    if (settings.pdfVersion) {
        princeOptions.pdf_version = settings.pdfVersion;
    }
    if (settings.forceCmyk) {
        princeOptions.force_identity_encoding = false;
    }

    return {
        name: DOCUMENT_NAME,
        document_type: 'pdf',
        document_content: html,
        test: settings.testMode,
        prince_options: princeOptions,
    };
}

/**
 * Pull readable messages out of a DocRaptor error body, which is usually
 * `<errors><error>...</error></errors>` XML.
 */
export function extractErrorMessage(body: string, status: number): string {
    const messages = Array.from(body.matchAll(/<error>([\s\S]*?)<\/error>/g), (m) => m[1].trim())
        .filter((m) => m.length > 0);
    if (messages.length > 0) return messages.join('; ');

    const text = body.trim();
    return text.length > 0 ? text : `HTTP ${status}`;
}

export function createDocRaptorClient(config: RenderServiceConfig): DocRaptorClient {
    const http: AxiosInstance = axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        auth: { username: config.apiKey, password: '' },
        headers: { 'Content-Type': 'application/json' },
        responseType: 'arraybuffer',
        validateStatus: () => true, // every status is handled below
    });

    return {
        async createPdf(html, settings) {
            const doc = buildDocRequest(html, settings);
            debugLog(`[DocRaptor] Submitting ${doc.name} (test=${doc.test}, profile=${doc.prince_options.profile ?? 'none'})`);

            let status: number;
            let data: ArrayBuffer;
            try {
                const res = await http.post<ArrayBuffer>('/docs', doc);
                status = res.status;
                data = res.data;
            } catch (err: unknown) {
                const msg = err instanceof Error ? err.message : String(err);
                console.error('[DocRaptor] Request failed:', msg);
                throw new RenderServiceError(msg);
            }

            const body = Buffer.from(data);
            if (status < 200 || status >= 300) {
                const message = extractErrorMessage(body.toString('utf-8'), status);
                console.warn(`[DocRaptor] HTTP ${status}: ${message}`);
                throw new RenderServiceError(message, status);
            }

            debugLog(`[DocRaptor] Received ${body.length} bytes`);
            return body;
        },
    };
}
