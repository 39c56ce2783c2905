/**
 * Imposition geometry for greeting cards.
 *
 * All measurements are inches, relative to the top-left trim corner of the
 * sheet (a single page for flat cards, a two-panel spread for folded cards).
 * The markup renderer positions panels from these boxes and nothing else.
 */
import { BLEED_IN, CARD_TYPES, FIT_MODES, TRIM_MARK_LENGTH_IN, TRIM_SIZE } from './constants.js';
import type {
    Box,
    CardLayout,
    CardType,
    Corner,
    FitMode,
    LineSegment,
    Panel,
    PanelLabel,
    Sheet,
    SheetLabel,
    Size,
    TrimMark,
} from './types.js';

export class InvalidConfigurationError extends Error {
    readonly field: 'cardType' | 'fitMode';

    constructor(field: 'cardType' | 'fitMode', value: unknown) {
        const allowed = field === 'cardType' ? CARD_TYPES : FIT_MODES;
        super(`Invalid ${field} "${String(value)}". Allowed: ${allowed.join(', ')}`);
        this.name = 'InvalidConfiguration';
        this.field = field;
    }
}

export function isCardType(value: unknown): value is CardType {
    return typeof value === 'string' && CARD_TYPES.some((t) => t === value);
}

export function isFitMode(value: unknown): value is FitMode {
    return typeof value === 'string' && FIT_MODES.some((m) => m === value);
}

/** Trim size of one printed sheet: a single panel for flat cards, two side by side when folded. */
export function getSheetTrimSize(cardType: CardType): Size {
    return cardType === 'folded'
        ? { width: TRIM_SIZE.width * 2, height: TRIM_SIZE.height }
        : { width: TRIM_SIZE.width, height: TRIM_SIZE.height };
}

export function boxArea(box: Box): number {
    return box.width * box.height;
}

/** True when the interiors intersect; boxes sharing only an edge do not overlap. */
export function panelsOverlap(a: Box, b: Box): boolean {
    return a.x < b.x + b.width
        && b.x < a.x + a.width
        && a.y < b.y + b.height
        && b.y < a.y + a.height;
}

/**
 * Grow the box by `bleed` on every edge that lies on the sheet boundary.
 * Edges shared with a neighbouring panel (the fold) stay on the trim line.
 */
function expandOuterEdges(box: Box, sheet: Size, bleed: number): Box {
    const left = box.x <= 0 ? bleed : 0;
    const top = box.y <= 0 ? bleed : 0;
    const right = box.x + box.width >= sheet.width ? bleed : 0;
    const bottom = box.y + box.height >= sheet.height ? bleed : 0;

    return {
        x: box.x - left,
        y: box.y - top,
        width: box.width + left + right,
        height: box.height + top + bottom,
    };
}

function cornerMark(corner: Corner, x: number, y: number, sheet: Size, offset: number): TrimMark {
    const segments: LineSegment[] = [];
    const dx = corner.endsWith('left') ? -1 : 1;
    const dy = corner.startsWith('top') ? -1 : 1;

    // Only draw along directions that leave the sheet; inner corners at the fold get a single mark.
    if ((dx < 0 && x <= 0) || (dx > 0 && x >= sheet.width)) {
        segments.push({
            x1: x + dx * offset,
            y1: y,
            x2: x + dx * (offset + TRIM_MARK_LENGTH_IN),
            y2: y,
        });
    }
    if ((dy < 0 && y <= 0) || (dy > 0 && y >= sheet.height)) {
        segments.push({
            x1: x,
            y1: y + dy * offset,
            x2: x,
            y2: y + dy * (offset + TRIM_MARK_LENGTH_IN),
        });
    }

    return { corner, x, y, segments };
}

function computeTrimMarks(box: Box, sheet: Size, offset: number): TrimMark[] {
    const right = box.x + box.width;
    const bottom = box.y + box.height;
    return [
        cornerMark('top-left', box.x, box.y, sheet, offset),
        cornerMark('top-right', right, box.y, sheet, offset),
        cornerMark('bottom-left', box.x, bottom, sheet, offset),
        cornerMark('bottom-right', right, bottom, sheet, offset),
    ];
}

function buildSheet(
    label: SheetLabel,
    cardType: CardType,
    panelLabels: PanelLabel[],
    bleed: number,
    fitMode: FitMode,
): Sheet {
    const size = getSheetTrimSize(cardType);

    const panels: Panel[] = panelLabels.map((panelLabel, index) => {
        const boundingBox: Box = {
            x: index * TRIM_SIZE.width,
            y: 0,
            width: TRIM_SIZE.width,
            height: TRIM_SIZE.height,
        };
        return {
            label: panelLabel,
            boundingBox,
            bleedBox: expandOuterEdges(boundingBox, size, bleed),
            imageFitMode: fitMode,
            trimMarks: bleed > 0 ? computeTrimMarks(boundingBox, size, bleed) : [],
        };
    });

    return {
        kind: cardType === 'folded' ? 'spread' : 'page',
        label,
        width: size.width,
        height: size.height,
        panels,
    };
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Compute the full imposition for one card.
 *
 * Flat cards print as two pages (front, back). Folded cards print as two
 * spreads: outside = panel4 | panel1, inside = panel2 | panel3.
 *
 * @throws InvalidConfigurationError when cardType or fitMode is not recognised
 */
export function computeLayout(cardType: unknown, bleedEnabled: boolean, fitMode: unknown): CardLayout {
    if (!isCardType(cardType)) {
        throw new InvalidConfigurationError('cardType', cardType);
    }
    if (!isFitMode(fitMode)) {
        throw new InvalidConfigurationError('fitMode', fitMode);
    }

    const bleed = bleedEnabled ? BLEED_IN : 0;

    const sheets: Sheet[] = cardType === 'folded'
        ? [
            buildSheet('outside', cardType, ['panel4', 'panel1'], bleed, fitMode),
            buildSheet('inside', cardType, ['panel2', 'panel3'], bleed, fitMode),
        ]
        : [
            buildSheet('front', cardType, ['front'], bleed, fitMode),
            buildSheet('back', cardType, ['back'], bleed, fitMode),
        ];

    const layout: CardLayout = {
        cardType,
        fitMode,
        bleedEnabled,
        bleed,
        trimSize: { width: TRIM_SIZE.width, height: TRIM_SIZE.height },
        sheetKind: cardType === 'folded' ? 'spread' : 'page',
        sheets,
    };
    return deepFreeze(layout);
}
