/**
 * Decoding of uploaded files. The browser sends files inside the JSON body as
 * `{ filename, data }`, where data is raw base64 or a `data:` URL.
 */
import type { CardType } from '../../../shared/types.js';

export const ALLOWED_IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'webp', 'tiff', 'tif'] as const;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;
const DATA_URL_PREFIX = /^data:[^,]*;base64,/;

export class UploadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UploadError';
    }
}

export interface UploadPayload {
    filename: string;
    data: string;
}

/** Base64 image data plus the subtype used in `data:image/<type>` URIs. */
export interface EncodedImage {
    data: string;
    type: string;
}

export interface AdditionalImages {
    back?: EncodedImage;
    inside?: EncodedImage;
}

export function isUploadPayload(value: unknown): value is UploadPayload {
    return typeof value === 'object'
        && value !== null
        && 'filename' in value
        && 'data' in value
        && typeof value.filename === 'string'
        && typeof value.data === 'string';
}

export function getFileExtension(filename: string): string | null {
    const dot = filename.lastIndexOf('.');
    if (dot < 0 || dot === filename.length - 1) return null;
    return filename.slice(dot + 1).toLowerCase();
}

export function isAllowedImage(filename: string): boolean {
    const ext = getFileExtension(filename);
    return ext !== null && ALLOWED_IMAGE_EXTENSIONS.some((allowed) => allowed === ext);
}

export function toImageType(extension: string): string {
    return extension === 'jpg' ? 'jpeg' : extension;
}

/** Strip an optional data URL prefix and whitespace; null when the rest is not base64. */
export function normalizeBase64(data: string): string | null {
    const stripped = data.replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
    return BASE64_PATTERN.test(stripped) ? stripped : null;
}

/**
 * Decode the required front image.
 * @throws UploadError with the message returned to the client
 */
export function decodeImageUpload(value: unknown): EncodedImage {
    if (value === undefined || value === null) {
        throw new UploadError('No image file provided');
    }
    if (!isUploadPayload(value) || value.filename === '') {
        throw new UploadError('No image file selected');
    }
    if (!isAllowedImage(value.filename)) {
        throw new UploadError(`Invalid file type. Allowed: ${ALLOWED_IMAGE_EXTENSIONS.join(', ')}`);
    }
    const data = normalizeBase64(value.data);
    if (!data) {
        throw new UploadError('Image data is not valid base64');
    }
    return { data, type: toImageType(getFileExtension(value.filename) ?? '') };
}

/** Optional images are dropped silently when missing or unusable. */
export function decodeOptionalImage(value: unknown): EncodedImage | undefined {
    if (!isUploadPayload(value) || !isAllowedImage(value.filename)) return undefined;
    const data = normalizeBase64(value.data);
    if (!data) return undefined;
    return { data, type: toImageType(getFileExtension(value.filename) ?? '') };
}

/**
 * Back image for either card type; inside image only for folded cards.
 * Both are ignored unless the user asked to provide all images.
 */
export function collectAdditionalImages(
    body: Record<string, unknown>,
    cardType: CardType,
    provideAll: boolean,
): AdditionalImages {
    const images: AdditionalImages = {};
    if (!provideAll) return images;

    const back = decodeOptionalImage(body.backImage);
    if (back) images.back = back;

    if (cardType === 'folded') {
        const inside = decodeOptionalImage(body.insideImage);
        if (inside) images.inside = inside;
    }
    return images;
}

/** Base64 of an uploaded `.icc` file, or undefined when none was sent or it is not an ICC profile. */
export function decodeIccUpload(value: unknown): string | undefined {
    if (!isUploadPayload(value)) return undefined;
    if (!value.filename.toLowerCase().endsWith('.icc')) return undefined;
    return normalizeBase64(value.data) ?? undefined;
}
