import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { GenerationSettings } from '../../../shared/types.js';

const { mockPost, mockCreate } = vi.hoisted(() => {
    const mockPost = vi.fn();
    const mockCreate = vi.fn(() => ({ post: mockPost }));
    return { mockPost, mockCreate };
});

vi.mock('axios', () => ({
    create: mockCreate,
    default: { create: mockCreate },
}));

import {
    buildDocRequest,
    createDocRaptorClient,
    extractErrorMessage,
    RenderServiceError,
} from './docRaptorClient.js';

const baseSettings: GenerationSettings = {
    cardType: 'flat',
    fitMode: 'cover',
    bleed: true,
    pdfProfile: 'PDF/X-4',
    trueBlack: true,
    cmykColors: false,
    forceCmyk: false,
    backgroundColor: '#ffffff',
    testMode: true,
};

const config = { apiKey: 'test-key', baseUrl: 'https://docraptor.test', timeoutMs: 5000 };

describe('buildDocRequest', () => {
    it('should set print DPI and the PDF profile', () => {
        expect(buildDocRequest('<html></html>', baseSettings)).toEqual({
            name: 'docraptor-test.pdf',
            document_type: 'pdf',
            document_content: '<html></html>',
            test: true,
            prince_options: { css_dpi: 300, profile: 'PDF/X-4' },
        });
    });

    it('should add version and CMYK options when requested', () => {
        const doc = buildDocRequest('<p></p>', {
            ...baseSettings,
            pdfProfile: '',
            pdfVersion: '1.7',
            forceCmyk: true,
            testMode: false,
        });

        expect(doc.test).toBe(false);
        expect(doc.prince_options).toEqual({
            css_dpi: 300,
            pdf_version: '1.7',
            force_identity_encoding: false,
        });
    });
});

describe('extractErrorMessage', () => {
    it('should join XML error elements', () => {
        const xml = '<?xml version="1.0"?><errors><error>Bad profile</error><error> Quota reached </error></errors>';
        expect(extractErrorMessage(xml, 422)).toBe('Bad profile; Quota reached');
    });

    it('should fall back to the raw body or the status', () => {
        expect(extractErrorMessage('  Service unavailable ', 503)).toBe('Service unavailable');
        expect(extractErrorMessage('', 502)).toBe('HTTP 502');
    });
});

describe('createDocRaptorClient', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should configure the HTTP client from the config struct', () => {
        createDocRaptorClient(config);

        expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({
            baseURL: 'https://docraptor.test',
            timeout: 5000,
            auth: { username: 'test-key', password: '' },
            responseType: 'arraybuffer',
        }));
    });

    it('should post the document and return the PDF bytes', async () => {
        mockPost.mockResolvedValue({ status: 200, data: Buffer.from('%PDF-1.7') });

        const pdf = await createDocRaptorClient(config).createPdf('<html></html>', baseSettings);

        expect(pdf.toString('utf-8')).toBe('%PDF-1.7');
        expect(mockPost).toHaveBeenCalledWith('/docs', buildDocRequest('<html></html>', baseSettings));
    });

    it('should raise RenderServiceError with the status on API errors', async () => {
        mockPost.mockResolvedValue({
            status: 401,
            data: Buffer.from('<errors><error>Invalid API key</error></errors>'),
        });

        const promise = createDocRaptorClient(config).createPdf('<html></html>', baseSettings);

        await expect(promise).rejects.toBeInstanceOf(RenderServiceError);
        await expect(promise).rejects.toMatchObject({ message: 'Invalid API key', status: 401 });
    });

    it('should wrap transport failures', async () => {
        mockPost.mockRejectedValue(new Error('timeout of 5000ms exceeded'));

        await expect(createDocRaptorClient(config).createPdf('<html></html>', baseSettings))
            .rejects.toMatchObject({ name: 'RenderServiceError', message: 'timeout of 5000ms exceeded', status: undefined });
    });
});
