import type { CardType, FitMode, Size } from './types.js';

// Panel trim size in inches
export const TRIM_SIZE: Size = Object.freeze({ width: 4.75, height: 6.75 });

// 1/8"
export const BLEED_IN = 0.125;

export const TRIM_MARK_LENGTH_IN = 0.25;

export const CARD_TYPES: readonly CardType[] = ['flat', 'folded'];

export const FIT_MODES: readonly FitMode[] = ['cover', 'contain', 'fill'];

// Profiles accepted by DocRaptor/Prince; '' means no profile
export const PDF_PROFILES = [
  'PDF/X-4',
  'PDF/X-1a',
  'PDF/X-3',
  'PDF/A-1a',
  'PDF/A-1b',
  'PDF/A-3a',
  'PDF/A-3b',
  'PDF/UA-1',
  '',
] as const;

export type PdfProfile = (typeof PDF_PROFILES)[number];

export const DEFAULT_PDF_PROFILE: PdfProfile = 'PDF/X-4';
