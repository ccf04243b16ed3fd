import { createRequire } from "node:module";
import { openSync } from "fontkit";
import { isWinAnsi } from "./win-ansi.js";

const require = createRequire(import.meta.url);

/** DejaVu Sans covers Latin, Greek, Cyrillic and most symbols */
export const DEFAULT_BODY_FONT = "dejavu-fonts-ttf/ttf/DejaVuSans.ttf";

const STANDARD_FONT = "Helvetica";

interface GlyphLookup {
  hasGlyphForCodePoint(codePoint: number): boolean;
}

function isGlyphLookup(value: unknown): value is GlyphLookup {
  return (
    typeof value === "object" &&
    value !== null &&
    "hasGlyphForCodePoint" in value &&
    typeof value.hasGlyphForCodePoint === "function"
  );
}

/** A font file holds either one face or a collection whose first face is used */
function firstFace(loaded: unknown): GlyphLookup | undefined {
  if (isGlyphLookup(loaded)) return loaded;
  if (typeof loaded === "object" && loaded !== null && "fonts" in loaded && Array.isArray(loaded.fonts)) {
    const [face]: unknown[] = loaded.fonts;
    return isGlyphLookup(face) ? face : undefined;
  }
  return undefined;
}

/**
 * The font body text is drawn with, and the characters it can draw. Text is
 * passed through `sanitize` so characters without a glyph show as "?".
 */
export class TextFont {
  constructor(
    /** A standard PDF font name or a path to a TrueType file */
    readonly source: string,
    private readonly covers: (codePoint: number) => boolean,
  ) {}

  get embedded(): boolean {
    return this.source !== STANDARD_FONT;
  }

  /** Helvetica, limited to the WinAnsi character set */
  static standard(): TextFont {
    return new TextFont(STANDARD_FONT, (codePoint) => isWinAnsi(String.fromCodePoint(codePoint)));
  }

  static load(path: string): TextFont {
    const face = firstFace(openSync(path));
    if (!face) {
      throw new Error(`No usable font face in ${path}`);
    }
    return new TextFont(path, (codePoint) => face.hasGlyphForCodePoint(codePoint));
  }

  sanitize(text: string): string {
    let result = "";
    for (const char of text) {
      const codePoint = char.codePointAt(0) ?? 0;
      const keep = char === "\n" || char === "\r" || char === "\t" || this.covers(codePoint);
      result += keep ? char : "?";
    }
    return result;
  }
}

let bodyFont: TextFont | undefined;

/**
 * The bundled Unicode font, or Helvetica when the font package cannot be
 * resolved. Loaded once per process.
 */
export function defaultTextFont(): TextFont {
  if (!bodyFont) {
    const path = resolveFontPath(DEFAULT_BODY_FONT);
    bodyFont = path ? TextFont.load(path) : TextFont.standard();
  }
  return bodyFont;
}

function resolveFontPath(specifier: string): string | undefined {
  try {
    return require.resolve(specifier);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "MODULE_NOT_FOUND") {
      return undefined;
    }
    throw error;
  }
}
