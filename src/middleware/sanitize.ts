/**
 * Outbound text sanitization — every broadcast or edit passes through here
 * before any backend sees it.
 *
 * Removes:
 * 1. C0/C1 control characters (newlines and tabs survive)
 * 2. Zero-width characters and directional overrides
 * 3. Unicode line/paragraph separators (normalised to \n)
 */

// ── Constants ───────────────────────────────────────────────────────

/** Longest text we consider sane to send anywhere (chars). */
export const MAX_MESSAGE_LENGTH = 4096;

// ── Control character stripping ─────────────────────────────────────

/**
 * Strip invisible and control characters. Newlines and tabs are kept so
 * multi-line templates keep their layout.
 */
export function sanitizeInput(text: string): string {
  return text
    // Unicode separators that break formatting
    .replace(/[\u2028\u2029]/g, '\n')
    // Carriage returns collapse into plain newlines
    .replace(/\r\n?/g, '\n')
    // C0 (minus \t and \n), DEL, and C1 controls
    .replace(/[\u0000-\u0008\u000B-\u001F\u007F-\u009F]/g, '')
    // Zero-width characters (U+200B-U+200F, U+FEFF)
    .replace(/[\u200B-\u200F\uFEFF]/g, '')
    // Directional overrides (U+202A-U+202E, U+2066-U+2069)
    .replace(/[\u202A-\u202E\u2066-\u2069]/g, '')
    .trim();
}

// ── Message length enforcement ──────────────────────────────────────

/**
 * Check if a message exceeds length limits. Returns null if OK,
 * or a rejection reason if too long.
 */
export function checkMessageLength(text: string): string | null {
  if (text.length > MAX_MESSAGE_LENGTH) {
    return `Message too long (${text.length} chars, max ${MAX_MESSAGE_LENGTH})`;
  }
  return null;
}
