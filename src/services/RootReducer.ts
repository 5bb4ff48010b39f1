/**
 * RootReducer — Maps a surface token to the key used for lexicon lookup.
 *
 * WHY REDUCE AT ALL?
 * ──────────────────
 * Lexicons list base forms ("fear", "celebrate"), but text is inflected
 * ("fears", "celebrated", "celebrating"). Without reduction those tokens
 * would count toward the word total and match nothing.
 *
 * THREE STRATEGIES:
 * ─────────────────
 *   identityRoot: no reduction, token is the key
 *   createLemmaReducer: dictionary forms from compromise, checked
 *     against the lexicon (the analyzer default)
 *   createStemmerReducer: algorithmic stemming (Porter, via `natural`).
 *     Stems are not words, so the lexicon must be re-keyed with
 *     lexicon.reduceKeys(reducer)
 *
 * Whatever the strategy, a reducer that throws or returns nothing is
 * replaced by the token itself (see safeRootOf). Reduction never fails
 * an analysis.
 */

import nlp from 'compromise';
import natural from 'natural';

export interface RootReducer {
    readonly name: string;
    rootOf(word: string): string;
}

/** Anything with a Porter-style `stem()` method, e.g. natural.PorterStemmer. */
export interface WordStemmer {
    stem(token: string): string;
}

export const identityRoot: RootReducer = {
    name: 'identity',
    rootOf: (word: string) => word,
};

/**
 * Apply a reducer with the fallback-to-token rule.
 */
export function safeRootOf(reducer: RootReducer, token: string): string {
    try {
        const root = reducer.rootOf(token);
        return typeof root === 'string' && root.length > 0 ? root : token;
    } catch {
        // Reduction failed for this token; the surface form is the key.
        return token;
    }
}


// ══════════════════════════════════════════════════════════════════════
// LEMMA REDUCER
// ══════════════════════════════════════════════════════════════════════
// compromise tags the word and conjugates it back to its dictionary
// form: verbs to the infinitive ("hoped" → "hope"), nouns to the
// singular ("worries" → "worry"). With a dictionary, a lemma is only
// used when the dictionary lists it, so "feed" never becomes "fee".
// ══════════════════════════════════════════════════════════════════════
const POSSESSIVE_SUFFIXES = ["'s", "'"];

function stripPossessive(word: string): string {
    for (const suffix of POSSESSIVE_SUFFIXES) {
        if (word.length > suffix.length && word.endsWith(suffix)) {
            return word.slice(0, -suffix.length);
        }
    }
    return word;
}

// Single-word lemmas that differ from the word, verb reading first.
function lemmaCandidates(word: string): string[] {
    const infinitive = nlp(word).verbs().toInfinitive().text();
    const singular = nlp(word).nouns().toSingular().text();

    const candidates: string[] = [];
    for (const raw of [infinitive, singular]) {
        const lemma = raw.trim().toLowerCase();
        if (lemma.length === 0 || lemma === word || /\s/.test(lemma)) continue;
        if (!candidates.includes(lemma)) candidates.push(lemma);
    }
    return candidates;
}

/**
 * Lemmatizing reducer backed by compromise.
 *
 * With `isKnown`, a known word is returned as is; otherwise the first
 * known lemma, otherwise the word (minus any possessive). Without it
 * the first lemma compromise offers is the root.
 */
export function createLemmaReducer(isKnown?: (word: string) => boolean): RootReducer {
    const rootOf = (word: string): string => {
        const base = stripPossessive(word);

        if (!isKnown) {
            return lemmaCandidates(base)[0] ?? base;
        }

        if (isKnown(word)) return word;
        if (isKnown(base)) return base;
        return lemmaCandidates(base).find(isKnown) ?? base;
    };

    return { name: isKnown ? 'lemma+dictionary' : 'lemma', rootOf };
}


// ══════════════════════════════════════════════════════════════════════
// STEMMER REDUCER
// ══════════════════════════════════════════════════════════════════════

/**
 * Wrap an algorithmic stemmer. Defaults to the Porter stemmer shipped
 * with `natural`.
 */
export function createStemmerReducer(
    stemmer: WordStemmer = natural.PorterStemmer,
    name = 'porter',
): RootReducer {
    return {
        name,
        rootOf: (word: string) => stemmer.stem(word),
    };
}
