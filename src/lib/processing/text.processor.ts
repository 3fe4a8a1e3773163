/**
 * Text Processor
 * Whitespace cleanup for extracted field values
 */

// Control characters other than tab, newline and carriage return
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

/**
 * Trim, turn newlines/tabs into spaces and collapse whitespace runs.
 * Returns undefined when nothing is left.
 */
export function cleanText(text: string | null | undefined): string | undefined {
  if (!text) {
    return undefined;
  }

  const cleaned = text
    .replace(CONTROL_CHARS, '')
    .replace(/[\r\n\t]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return cleaned.length > 0 ? cleaned : undefined;
}

/**
 * Lower-cased, trimmed form used when hashing
 */
export function toHashInput(text: string | null | undefined): string {
  return (text ?? '').toLowerCase().trim();
}
