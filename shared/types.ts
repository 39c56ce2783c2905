export type CardType = 'flat' | 'folded';

export type FitMode = 'cover' | 'contain' | 'fill';

export type PanelLabel = 'front' | 'back' | 'panel1' | 'panel2' | 'panel3' | 'panel4';

export type SheetKind = 'page' | 'spread';

export type SheetLabel = 'front' | 'back' | 'outside' | 'inside';

export type Corner = 'top-left' | 'top-right' | 'bottom-left' | 'bottom-right';

/** Rectangle in inches, origin at the sheet's top-left trim corner. */
export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface LineSegment {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface TrimMark {
  corner: Corner;
  // Corner point, always on the nominal trim boundary
  x: number;
  y: number;
  segments: LineSegment[];
}

export interface Panel {
  label: PanelLabel;
  boundingBox: Box;
  bleedBox: Box;
  imageFitMode: FitMode;
  trimMarks: TrimMark[];
}

export interface Sheet {
  kind: SheetKind;
  label: SheetLabel;
  width: number;
  height: number;
  panels: Panel[];
}

export interface CardLayout {
  cardType: CardType;
  fitMode: FitMode;
  bleedEnabled: boolean;
  bleed: number;
  trimSize: Size;
  sheetKind: SheetKind;
  sheets: Sheet[];
}

export interface IccProfileInfo {
  filename: string;
  name: string;
}

/** Options the markup renderer and render service consume; layout geometry ignores all but cardType, fitMode and bleed. */
export interface GenerationSettings {
  cardType: CardType;
  fitMode: FitMode;
  bleed: boolean;
  pdfProfile: string;
  iccBase64?: string | undefined;
  trueBlack: boolean;
  cmykColors: boolean;
  forceCmyk: boolean;
  backgroundColor: string;
  testMode: boolean;
  pdfVersion?: string | undefined;
}
