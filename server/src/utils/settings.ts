import { DEFAULT_PDF_PROFILE, PDF_PROFILES } from '../../../shared/constants.js';
import { InvalidConfigurationError, isCardType, isFitMode } from '../../../shared/cardLayout.js';
import type { GenerationSettings } from '../../../shared/types.js';

const HEX_COLOR_PATTERN = /^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{4}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/;
const PDF_VERSION_PATTERN = /^\d\.\d$/;

export const DEFAULT_BACKGROUND_COLOR = '#ffffff';

export class SettingsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SettingsError';
    }
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

// Form checkboxes arrive as "true"/"false" strings; anything else is off
export const toFlag = (value: unknown): boolean => value === true || value === 'true';

const isPdfProfile = (value: unknown): value is string =>
    typeof value === 'string' && PDF_PROFILES.some((p) => p === value);

/**
 * Build generation settings from a request body.
 * Missing options fall back to defaults; present but unrecognised card types
 * and fit modes raise InvalidConfigurationError, other bad values SettingsError.
 */
export function parseGenerationSettings(
    body: Record<string, unknown>,
    extras: { iccBase64?: string | undefined } = {},
): GenerationSettings {
    const cardType = body.cardType ?? 'flat';
    if (!isCardType(cardType)) {
        throw new InvalidConfigurationError('cardType', cardType);
    }

    const fitMode = body.fitMode ?? 'cover';
    if (!isFitMode(fitMode)) {
        throw new InvalidConfigurationError('fitMode', fitMode);
    }

    const pdfProfile = body.pdfProfile ?? DEFAULT_PDF_PROFILE;
    if (!isPdfProfile(pdfProfile)) {
        throw new SettingsError(`Unsupported PDF profile "${String(pdfProfile)}"`);
    }

    const backgroundColor = body.backgroundColor ?? DEFAULT_BACKGROUND_COLOR;
    if (typeof backgroundColor !== 'string' || !HEX_COLOR_PATTERN.test(backgroundColor)) {
        throw new SettingsError('Background color must be a hex color such as #ffffff');
    }

    let pdfVersion: string | undefined;
    if (typeof body.pdfVersion === 'string' && body.pdfVersion.trim() !== '') {
        pdfVersion = body.pdfVersion.trim();
        if (!PDF_VERSION_PATTERN.test(pdfVersion)) {
            throw new SettingsError(`Invalid PDF version "${pdfVersion}"`);
        }
    }

    return {
        cardType,
        fitMode,
        bleed: toFlag(body.bleed),
        pdfProfile,
        iccBase64: extras.iccBase64,
        trueBlack: toFlag(body.trueBlack),
        cmykColors: toFlag(body.cmykColors),
        forceCmyk: toFlag(body.forceCmyk),
        backgroundColor,
        testMode: toFlag(body.testMode),
        pdfVersion,
    };
}

/** Attachment name for a generated PDF, e.g. output_PDF-X-4.pdf. */
export function outputFilename(pdfProfile: string): string {
    return `output_${pdfProfile ? pdfProfile.replace(/\//g, '-') : 'default'}.pdf`;
}
