/**
 * Text cleanup applied before a transcript reaches the clipboard.
 */

export type TextEncodingTarget = 'utf8' | 'latin1' | 'ascii';

export const PLACEHOLDER = '?';

const MAX_CODE_POINT: Record<Exclude<TextEncodingTarget, 'utf8'>, number> = {
  ascii: 0x7f,
  latin1: 0xff,
};

// C0 controls other than tab (0x09) and newline (0x0a), plus DEL
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u0008\u000b-\u001f\u007f]/g;

// A high surrogate not followed by a low one, or a low one not preceded by a high one
const LONE_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g;

/**
 * Make text safe to write to the clipboard in the target encoding.
 * Characters the target cannot represent become `?`; nothing throws.
 */
export function sanitizeText(text: string | null | undefined, target: TextEncodingTarget = 'utf8'): string {
  if (text == null) {
    return '';
  }

  let cleaned = text
    .replace(/\r\n?/g, '\n')
    .replace(CONTROL_CHARS, '')
    .replace(LONE_SURROGATE, '\ufffd');

  if (target !== 'utf8') {
    const max = MAX_CODE_POINT[target];
    let out = '';
    for (const char of cleaned) {
      const codePoint = char.codePointAt(0) ?? 0;
      out += codePoint > max ? PLACEHOLDER : char;
    }
    cleaned = out;
  }

  return cleaned.trim();
}
