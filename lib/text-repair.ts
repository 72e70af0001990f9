/**
 * Repair of UTF-8 text that was decoded as Latin-1 somewhere upstream
 * ("CafÃ©" instead of "Café").
 *
 * The repair only applies to strings with that exact signature: every code
 * point fits in one byte, at least one UTF-8 lead byte (C2–F4) is followed by
 * a continuation byte (80–BF), and the bytes form valid UTF-8 as a whole.
 * Any other string is returned unchanged.
 */

const LEAD_THEN_CONTINUATION = /[\u00C2-\u00F4][\u0080-\u00BF]/
const BEYOND_LATIN1 = /[^\u0000-\u00FF]/

const strictUtf8 = new TextDecoder('utf-8', { fatal: true })

export function hasMojibakeSignature(text: string): boolean {
  return !BEYOND_LATIN1.test(text) && LEAD_THEN_CONTINUATION.test(text)
}

export function repairMojibake(text: string): string {
  if (!hasMojibakeSignature(text)) {
    return text
  }

  try {
    return strictUtf8.decode(Buffer.from(text, 'latin1'))
  } catch (err) {
    if (err instanceof TypeError) {
      // Not valid UTF-8 after all: a genuine Latin-1 string.
      return text
    }
    throw err
  }
}
