/**
 * Serializes a computed CardLayout into the HTML/CSS document sent to DocRaptor.
 *
 * Every sheet becomes one PDF page sized to its trim box. Panels are absolutely
 * positioned at their bleed boxes, so content reaches into the `@page` bleed
 * area only on outer edges and meets exactly at the fold.
 */
import { getSheetTrimSize } from '../../../shared/cardLayout.js';
import type { Box, CardLayout, FitMode, GenerationSettings, Panel, Sheet } from '../../../shared/types.js';
import { escapeHtml, inches } from '../utils/html.js';
import type { EncodedImage } from '../utils/uploadUtils.js';
import { buildPrincePdfCss } from './princeCss.js';
import {
    BACK_PANEL_CONTENT,
    COMMON_STYLES,
    INSIDE_LEFT_CONTENT,
    INSIDE_RIGHT_CONTENT,
    PANEL_4_CONTENT,
} from './panelContent.js';

export interface CardImages {
    front: EncodedImage;
    back?: EncodedImage | undefined;
    inside?: EncodedImage | undefined;
}

export type RenderSettings = Pick<
    GenerationSettings,
    'pdfProfile' | 'trueBlack' | 'cmykColors' | 'iccBase64' | 'backgroundColor'
>;

export function imageTag(image: EncodedImage, alt: string, fit: FitMode, position = 'center'): string {
    const src = `data:image/${escapeHtml(image.type)};base64,${escapeHtml(image.data)}`;
    return `<img class="image" src="${src}" alt="${escapeHtml(alt)}" style="object-fit: ${fit}; object-position: ${position};">`;
}

export function boxStyle(box: Box): string {
    return `left: ${inches(box.x)}; top: ${inches(box.y)}; width: ${inches(box.width)}; height: ${inches(box.height)};`;
}

export function renderPanelContent(panel: Panel, images: CardImages): string {
    const fit = panel.imageFitMode;
    switch (panel.label) {
        case 'front':
            return imageTag(images.front, 'Card Front', fit);
        case 'panel1':
            return imageTag(images.front, 'Front Cover', fit);
        case 'back':
            return images.back ? imageTag(images.back, 'Card Back', fit) : BACK_PANEL_CONTENT;
        case 'panel4':
            return images.back ? imageTag(images.back, 'Back Cover', fit) : PANEL_4_CONTENT;
        // One inside image spans both inside panels, each showing its half
        case 'panel2':
            return images.inside ? imageTag(images.inside, 'Inside Left', fit, 'right center') : INSIDE_LEFT_CONTENT;
        case 'panel3':
            return images.inside ? imageTag(images.inside, 'Inside Right', fit, 'left center') : INSIDE_RIGHT_CONTENT;
    }
}

// The outside spread always shows the fold; the inside only around placeholder content
export function hasFoldIndicator(sheet: Sheet, images: CardImages): boolean {
    return sheet.kind === 'spread' && (sheet.label === 'outside' || !images.inside);
}

export function hasTrimMarks(layout: CardLayout): boolean {
    return layout.sheets.some((sheet) => sheet.panels.some((panel) => panel.trimMarks.length > 0));
}

export function renderPageRule(layout: CardLayout): string {
    const size = getSheetTrimSize(layout.cardType);
    return [
        '@page {',
        `    size: ${inches(size.width)} ${inches(size.height)};`,
        '    margin: 0;',
        `    bleed: ${inches(layout.bleed)};`,
        // Crop marks only; registration marks are never printed
        `    marks: ${hasTrimMarks(layout) ? 'crop' : 'none'};`,
        '}',
    ].join('\n');
}

function renderSheet(sheet: Sheet, images: CardImages): string {
    const panels = sheet.panels.map((panel) => `
        <div class="panel panel-${panel.label}" style="${boxStyle(panel.bleedBox)}">
            ${renderPanelContent(panel, images)}
        </div>`).join('');

    const fold = hasFoldIndicator(sheet, images) ? '\n        <div class="fold-indicator"></div>' : '';

    return `
    <div class="sheet sheet-${sheet.label}">${panels}${fold}
    </div>`;
}

export function renderCardHtml(layout: CardLayout, images: CardImages, settings: RenderSettings): string {
    const size = getSheetTrimSize(layout.cardType);

    return `<!DOCTYPE html>
<html>
<head>
    <meta charset="UTF-8">
    <style>
${buildPrincePdfCss(settings)}

${renderPageRule(layout)}
${COMMON_STYLES}
.sheet {
    position: relative;
    width: ${inches(size.width)};
    height: ${inches(size.height)};
    page-break-after: always;
    overflow: visible;
}

.sheet:last-child {
    page-break-after: avoid;
}

.panel {
    position: absolute;
    overflow: hidden;
    background-color: ${settings.backgroundColor};
}

/* Fold line guide on the trim, very subtle */
.fold-indicator {
    position: absolute;
    top: 0;
    left: ${inches(size.width / 2)};
    width: 0;
    height: 100%;
    border-left: 0.5px dashed rgba(200, 200, 200, 0.5);
    z-index: 10;
}
    </style>
</head>
<body>${layout.sheets.map((sheet) => renderSheet(sheet, images)).join('')}
</body>
</html>`;
}
