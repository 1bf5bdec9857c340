const CJK_PATTERN = /[぀-ヿ㐀-䶿一-鿿가-힯＀-￯]/;

export const containsCjk = (text: string): boolean => CJK_PATTERN.test(text);

/**
 * Cleans translator output before layout: full-width periods and ellipsis
 * glyphs become ASCII, runs of dots collapse to "...", and horizontal
 * whitespace is squeezed. Newlines are kept as hard breaks.
 */
export const normalizeTranslatedText = (text: string): string =>
  text
    .replace(/．/g, '.')
    .replace(/…/g, '...')
    .replace(/\.[ \t]+(?=\.)/g, '.')
    .replace(/\.{3,}/g, '...')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t　]+/g, ' ').trim())
    .join('\n')
    .trim();
