import { PageSizes, StandardFonts, rgb, type PDFDocument, type PDFFont, type RGB } from "pdf-lib";
import type { ThemeConfig } from "../config";

export class ThemeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ThemeError";
  }
}

export interface ThemeFont {
  face: PDFFont;
  size: number;
}

/** Visual theme for one document: page geometry, spacing, colours and fonts. */
export interface PdfTheme {
  readonly pageSize: [number, number];
  readonly marginLeft: number;
  readonly marginRight: number;
  readonly marginTop: number;
  readonly marginBottom: number;
  readonly pageHeaderTop: number;

  readonly paragraphSpacing: number;
  readonly tableColGap: number;
  readonly lineSpacingHeading: number;

  readonly colorPrimary: RGB;
  readonly colorDark: RGB;
  readonly colorMuted: RGB;

  readonly fontH1: ThemeFont;
  readonly fontH2: ThemeFont;
  readonly fontH3: ThemeFont;
  readonly fontH4: ThemeFont;
  readonly fontNormal: ThemeFont;
  readonly fontNormalBold: ThemeFont;
  readonly fontSmall: ThemeFont;
  readonly fontSmallBold: ThemeFont;
  readonly fontMono: ThemeFont;

  readonly title: string;
}

export const LINE_HEIGHT_FACTOR = 1.5;

export function lineHeight(font: ThemeFont): number {
  return font.size * LINE_HEIGHT_FACTOR;
}

/** Drawn in place of a character the face has no code for. */
export const REPLACEMENT_CHAR = "?";

const characterSets = new WeakMap<PDFFont, Set<number>>();

function characterSet(face: PDFFont): Set<number> {
  let set = characterSets.get(face);
  if (!set) {
    set = new Set(face.getCharacterSet());
    characterSets.set(face, set);
  }
  return set;
}

/**
 * Maps every character the face cannot encode to one the face can: white
 * space to " ", anything else to "?". Standard faces only cover WinAnsi.
 */
export function encodable(font: ThemeFont, text: string): string {
  const set = characterSet(font.face);
  let out = "";
  for (const ch of text) {
    const code = ch.codePointAt(0);
    if (code !== undefined && set.has(code)) out += ch;
    else if (/\s/.test(ch)) out += " ";
    else out += REPLACEMENT_CHAR;
  }
  return out;
}

export function measureWith(font: ThemeFont): (text: string) => number {
  return (text) => font.face.widthOfTextAtSize(encodable(font, text), font.size);
}

function hexToRgb(hex: string): RGB {
  const n = parseInt(hex.slice(1), 16);
  return rgb(((n >> 16) & 0xff) / 255, ((n >> 8) & 0xff) / 255, (n & 0xff) / 255);
}

function standardFace(name: string): StandardFonts {
  const face = Object.values(StandardFonts).find((f) => f === name);
  if (!face) {
    throw new ThemeError(
      `Unknown font face "${name}" (expected one of: ${Object.values(StandardFonts).join(", ")})`
    );
  }
  return face;
}

/** Embeds the configured faces into `doc` and builds the theme. */
export async function createTheme(doc: PDFDocument, config: ThemeConfig): Promise<PdfTheme> {
  const sans = await doc.embedFont(standardFace(config.fonts.sans));
  const sansBold = await doc.embedFont(standardFace(config.fonts.sansBold));
  const mono = await doc.embedFont(standardFace(config.fonts.mono));
  const [width, height] = PageSizes[config.pageSize];

  return {
    pageSize: [width, height],
    marginLeft: config.margins.left,
    marginRight: config.margins.right,
    marginTop: config.margins.top,
    marginBottom: config.margins.bottom,
    pageHeaderTop: config.pageHeaderTop,

    paragraphSpacing: config.paragraphSpacing,
    tableColGap: config.tableColGap,
    lineSpacingHeading: config.lineSpacingHeading,

    colorPrimary: hexToRgb(config.colors.primary),
    colorDark: hexToRgb(config.colors.dark),
    colorMuted: hexToRgb(config.colors.muted),

    fontH1: { face: sansBold, size: 18 },
    fontH2: { face: sansBold, size: 14 },
    fontH3: { face: sansBold, size: 12 },
    fontH4: { face: sansBold, size: 11 },
    fontNormal: { face: sans, size: 10 },
    fontNormalBold: { face: sansBold, size: 10 },
    fontSmall: { face: sans, size: 8 },
    fontSmallBold: { face: sansBold, size: 8 },
    fontMono: { face: mono, size: 9.5 },

    title: config.title,
  };
}
