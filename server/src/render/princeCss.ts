import type { GenerationSettings } from '../../../shared/types.js';

type PrinceCssSettings = Pick<GenerationSettings, 'pdfProfile' | 'trueBlack' | 'cmykColors' | 'iccBase64'>;

export function getColorOptions(settings: PrinceCssSettings): string[] {
    const options: string[] = [];
    if (settings.trueBlack) options.push('use-true-black');
    if (settings.cmykColors) options.push('use-cmyk-colors');
    return options;
}

/**
 * `@prince-pdf` rule carrying the PDF profile, colour options and output intent.
 * The ICC profile is embedded as a data URI so the document is self-contained.
 * Empty when no option applies.
 */
export function buildPrincePdfCss(settings: PrinceCssSettings): string {
    const declarations: string[] = [];

    if (settings.pdfProfile) {
        declarations.push(`prince-pdf-profile: "${settings.pdfProfile}";`);
    }

    const colorOptions = getColorOptions(settings);
    if (colorOptions.length > 0) {
        declarations.push(`prince-pdf-color-options: ${colorOptions.join(' ')};`);
    }

    if (settings.iccBase64) {
        declarations.push(
            `prince-pdf-output-intent: url("data:application/vnd.iccprofile;base64,${settings.iccBase64}");`,
        );
    }

    if (declarations.length === 0) return '';

    return ['@prince-pdf {', ...declarations.map((d) => `    ${d}`), '}'].join('\n');
}
