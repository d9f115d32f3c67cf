/**
 * TextNormalizer - text preparation for roster matching
 *
 * Page text from pdftotext `-layout` or Tesseract carries layout whitespace and
 * may use decomposed accents (A + U+0303 instead of Ã). Both sides of a
 * comparison go through the same normalization.
 */
export class TextNormalizer {
  /**
   * Normalizes text
   * - Unicode NFC
   * - Tabs, non-breaking and zero-width spaces become regular spaces
   * - Runs of whitespace (including line breaks) collapse to one space
   * - Leading and trailing spaces are trimmed
   */
  static normalize(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .replace(/[\t\u00A0\u2000-\u200B]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * Case-insensitive comparison key
   */
  static toMatchKey(text: string): string {
    return TextNormalizer.normalize(text).toUpperCase();
  }

  /**
   * First `maxLength` characters of the text (code points, not UTF-16 units)
   */
  static preview(text: string, maxLength: number): string {
    const chars = Array.from(text);
    return chars.length <= maxLength ? text : chars.slice(0, maxLength).join('');
  }
}
