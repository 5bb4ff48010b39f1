/**
 * Tokenizer — Splits raw text into lowercase word tokens.
 *
 * A token is a run of letters, optionally joined by inner apostrophes
 * ("don't", "friend's"). Everything else (punctuation, digits, symbols,
 * emoji, whitespace) separates tokens and is never part of one.
 *
 *   "Fear! Joy."        → ["fear", "joy"]
 *   "abc123def"         → ["abc", "def"]
 *   "It’s 3 o'clock"    → ["it's", "o'clock"]
 *
 * Letters are matched by Unicode property, so non-English words are
 * tokens too; they simply won't match an English lexicon.
 */

export interface TokenizeOptions {
    /** Tokens shorter than this are dropped. Defaults to 1. */
    minTokenLength?: number;
}

const WORD_REGEX = /\p{L}[\p{L}\p{M}]*(?:['’]\p{L}[\p{L}\p{M}]*)*/gu;
const WHOLE_WORD_REGEX = /^\p{L}[\p{L}\p{M}]*(?:['’]\p{L}[\p{L}\p{M}]*)*$/u;

const normalizeApostrophes = (token: string): string => token.replace(/’/g, "'");

export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
    if (typeof text !== 'string' || text.length === 0) return [];
    const minLength = options.minTokenLength ?? 1;

    return (text.toLowerCase().match(WORD_REGEX) ?? [])
        .map(normalizeApostrophes)
        .filter(token => token.length >= minLength);
}

/**
 * Clean a caller-supplied token list: trim, lowercase, and drop anything
 * that is not a single alphabetic word. Order is preserved.
 */
export function normalizeTokens(tokens: readonly string[], options: TokenizeOptions = {}): string[] {
    const minLength = options.minTokenLength ?? 1;
    const words: string[] = [];

    for (const raw of tokens) {
        if (typeof raw !== 'string') continue;
        const token = normalizeApostrophes(raw.trim().toLowerCase());
        if (token.length >= minLength && WHOLE_WORD_REGEX.test(token)) {
            words.push(token);
        }
    }
    return words;
}
