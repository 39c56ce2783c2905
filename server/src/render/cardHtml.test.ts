import { describe, it, expect } from 'vitest';
import { computeLayout } from '../../../shared/cardLayout.js';
import {
    boxStyle,
    imageTag,
    renderCardHtml,
    renderPageRule,
    renderPanelContent,
    type RenderSettings,
} from './cardHtml.js';

const settings: RenderSettings = {
    pdfProfile: 'PDF/X-4',
    trueBlack: true,
    cmykColors: false,
    iccBase64: undefined,
    backgroundColor: '#fafafa',
};

const front = { data: 'RlJPTlQ=', type: 'png' };
const back = { data: 'QkFDSw==', type: 'jpeg' };
const inside = { data: 'SU5TSURF', type: 'webp' };

const countOf = (haystack: string, needle: string) => haystack.split(needle).length - 1;

const FOLD = '<div class="fold-indicator"></div>';

describe('renderPageRule', () => {
    it('should size pages to the trim box with crop marks when bleeding', () => {
        expect(renderPageRule(computeLayout('flat', true, 'cover'))).toBe([
            '@page {',
            '    size: 4.75in 6.75in;',
            '    margin: 0;',
            '    bleed: 0.125in;',
            '    marks: crop;',
            '}',
        ].join('\n'));
    });

    it('should size spreads without marks when not bleeding', () => {
        expect(renderPageRule(computeLayout('folded', false, 'cover'))).toBe([
            '@page {',
            '    size: 9.5in 6.75in;',
            '    margin: 0;',
            '    bleed: 0in;',
            '    marks: none;',
            '}',
        ].join('\n'));
    });
});

describe('boxStyle', () => {
    it('should position a box in inches', () => {
        expect(boxStyle({ x: -0.125, y: -0.125, width: 5, height: 7 }))
            .toBe('left: -0.125in; top: -0.125in; width: 5in; height: 7in;');
    });
});

describe('imageTag', () => {
    it('should embed the image and escape the alt text', () => {
        expect(imageTag({ data: 'QUJD', type: 'png' }, 'a "b"', 'contain')).toBe(
            '<img class="image" src="data:image/png;base64,QUJD" alt="a &quot;b&quot;" style="object-fit: contain; object-position: center;">',
        );
    });
});

describe('renderPanelContent', () => {
    it('should split one inside image across both inside panels', () => {
        const [left, right] = computeLayout('folded', true, 'fill').sheets[1].panels;

        expect(renderPanelContent(left, { front, inside })).toBe(
            '<img class="image" src="data:image/webp;base64,SU5TSURF" alt="Inside Left" style="object-fit: fill; object-position: right center;">',
        );
        expect(renderPanelContent(right, { front, inside })).toBe(
            '<img class="image" src="data:image/webp;base64,SU5TSURF" alt="Inside Right" style="object-fit: fill; object-position: left center;">',
        );
    });

    it('should use placeholder content for a missing back image', () => {
        const [panel4] = computeLayout('folded', false, 'cover').sheets[0].panels;
        expect(renderPanelContent(panel4, { front })).toContain('<p class="small-text">Panel 4 - Back Cover</p>');
    });
});

describe('renderCardHtml', () => {
    it('should render a flat card as two bled pages', () => {
        const html = renderCardHtml(computeLayout('flat', true, 'cover'), { front }, settings);

        expect(countOf(html, '<div class="sheet ')).toBe(2);
        expect(html).toContain(
            '<div class="panel panel-front" style="left: -0.125in; top: -0.125in; width: 5in; height: 7in;">',
        );
        expect(html).toContain('alt="Card Front"');
        expect(html).toContain('<h2>Premium Greeting Card</h2>');
        expect(html).toContain('prince-pdf-profile: "PDF/X-4";');
        expect(html).toContain('background-color: #fafafa;');
        expect(countOf(html, FOLD)).toBe(0);
    });

    it('should use the back image when provided', () => {
        const html = renderCardHtml(computeLayout('flat', false, 'contain'), { front, back }, settings);

        expect(html).toContain('src="data:image/jpeg;base64,QkFDSw==" alt="Card Back" style="object-fit: contain;');
        expect(html).not.toContain('<h2>Premium Greeting Card</h2>');
    });

    it('should keep the fold edge on the trim line for folded spreads', () => {
        const html = renderCardHtml(computeLayout('folded', true, 'cover'), { front }, settings);

        expect(html).toContain(
            '<div class="panel panel-panel4" style="left: -0.125in; top: -0.125in; width: 4.875in; height: 7in;">',
        );
        expect(html).toContain(
            '<div class="panel panel-panel1" style="left: 4.75in; top: -0.125in; width: 4.875in; height: 7in;">',
        );
        expect(html).toContain('left: 4.75in;\n    width: 0;');
    });

    it('should show the fold on the inside only around placeholder content', () => {
        const layout = computeLayout('folded', false, 'cover');

        expect(countOf(renderCardHtml(layout, { front }, settings), FOLD)).toBe(2);
        expect(countOf(renderCardHtml(layout, { front, inside }, settings), FOLD)).toBe(1);
    });
});
