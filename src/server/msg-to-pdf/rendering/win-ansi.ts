/**
 * The standard PDF fonts only encode WinAnsi. Anything outside it becomes "?".
 */
const WIN_ANSI_CHAR =
  /[\t\n\r\x20-\x7e\xa0-\xff\u0152\u0153\u0160\u0161\u0178\u017d\u017e\u0192\u02c6\u02dc\u2013\u2014\u2018-\u201a\u201c-\u201e\u2020-\u2022\u2026\u2030\u2039\u203a\u20ac\u2122]/;

const NOT_WIN_ANSI = new RegExp(`[^${WIN_ANSI_CHAR.source.slice(1, -1)}]`, "g");

export function isWinAnsi(char: string): boolean {
  return char.length === 1 && WIN_ANSI_CHAR.test(char);
}

export function toWinAnsi(text: string): string {
  return text.replace(NOT_WIN_ANSI, "?");
}
