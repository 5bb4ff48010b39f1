/**
 * AffectAnalyzer — Estimates the affect distribution of a body of text.
 *
 * WHAT THIS DOES:
 * ───────────────
 * Takes a string of text and a Lexicon and counts, for each of the ten
 * affect labels, how many words in the text carry that label.
 *
 * Example (lexicon: happy/joyful → joy+positive, fear → fear+negative):
 *   new AffectAnalyzer("happy joyful fear", lexicon).result
 *   → {
 *       totalWords: 3,
 *       rawCounts:   { joy: 2, positive: 2, fear: 1, negative: 1, ...0 },
 *       frequencies: { joy: 0.667, positive: 0.667, fear: 0.333, ... },
 *       topEmotions: [['positive', 0.667], ['joy', 0.667]],
 *       ...
 *     }
 *
 * PIPELINE:
 * ─────────
 *   1. tokenize: lowercase alphabetic words, punctuation dropped
 *   2. root-reduce: each token → lookup key (falls back to token)
 *   3. score: every token counts toward totalWords; matched tokens
 *      add 1 to each of their affect labels
 *   4. build frequencies: rawCount / totalWords (0 when totalWords is 0)
 *
 * A word carrying several labels adds to each of them, so frequencies
 * need not sum to 1. Words not in the lexicon only add to the total.
 *
 * The analysis runs once, in the constructor. The analyzer never writes
 * to the lexicon and keeps no state between instances; the same text and
 * lexicon always give the same result.
 */

import { AFFECT_LABELS, emptyAffectTable } from '../data/affects';
import type { AffectLabel, AffectTable } from '../data/affects';
import { defaultSettings } from './AnalyzerConfig';
import type { AnalyzerConfig, AnalyzerSettings } from './AnalyzerConfig';
import { ConfigurationError } from './errors';
import type { Lexicon } from './Lexicon';
import { createLemmaReducer, identityRoot, safeRootOf } from './RootReducer';
import type { RootReducer } from './RootReducer';
import { normalizeTokens, tokenize } from './Tokenizer';

// ══════════════════════════════════════════════════════════════════════
// TYPES
// ══════════════════════════════════════════════════════════════════════

export interface AnalysisResult {
    /** Lookup keys that were scored, in text order. One per token. */
    readonly words: readonly string[];
    /** Number of alphabetic tokens, matched or not. */
    readonly totalWords: number;
    readonly rawCounts: Readonly<AffectTable>;
    /** rawCount / totalWords per label, each in [0, 1]. */
    readonly frequencies: Readonly<AffectTable>;
    /** rawCount / (sum of all rawCounts): each label's share of the affect hits. */
    readonly affectShares: Readonly<AffectTable>;
    /** Every label contributed by a matched word, in order, duplicates kept. */
    readonly affectList: readonly AffectLabel[];
    /** Matched lookup key → its labels. */
    readonly affectDict: Readonly<Record<string, readonly AffectLabel[]>>;
    /** Labels tied at the highest frequency. Empty when nothing matched. */
    readonly topEmotions: ReadonlyArray<readonly [AffectLabel, number]>;
}

export interface AnalyzerOptions {
    /**
     * Token → lookup key. Defaults to a compromise lemma reducer that
     * checks lemmas against the analyzer's own lexicon.
     */
    rootReducer?: RootReducer;
    /** Read once, at construction. Parameter defaults when omitted. */
    config?: AnalyzerConfig;
}

function requireLexicon(lexicon: Lexicon | null | undefined): Lexicon {
    if (!lexicon) {
        throw new ConfigurationError('AffectAnalyzer requires a loaded lexicon, got none');
    }
    if (lexicon.size === 0) {
        throw new ConfigurationError('AffectAnalyzer requires a non-empty lexicon');
    }
    return lexicon;
}


// ══════════════════════════════════════════════════════════════════════
// AFFECT ANALYZER
// ══════════════════════════════════════════════════════════════════════

export class AffectAnalyzer {
    readonly text: string;
    readonly lexicon: Lexicon;
    readonly result: AnalysisResult;

    private readonly rootReducer: RootReducer;
    private readonly settings: AnalyzerSettings;

    /**
     * @throws ConfigurationError if the lexicon is absent or empty.
     */
    constructor(text: string, lexicon: Lexicon | null | undefined, options: AnalyzerOptions = {}) {
        this.lexicon = requireLexicon(lexicon);
        this.text = typeof text === 'string' ? text : '';
        this.settings = options.config?.toJSON() ?? defaultSettings();

        const known = this.lexicon;
        this.rootReducer = options.rootReducer ?? createLemmaReducer(word => known.has(word));

        this.result = this.analyze();
    }

    /**
     * Analyze text that the caller already tokenized (and possibly
     * lemmatized). Tokens are lower-cased and non-words dropped, but no
     * root reduction is applied.
     */
    static fromTokens(
        tokens: readonly string[],
        lexicon: Lexicon | null | undefined,
        config?: AnalyzerConfig,
    ): AffectAnalyzer {
        const { minTokenLength } = config?.toJSON() ?? defaultSettings();
        const words = normalizeTokens(tokens, { minTokenLength });
        return new AffectAnalyzer(words.join(' '), lexicon, { config, rootReducer: identityRoot });
    }

    // ── Accessors ────────────────────────────────────────────────────

    get rawCounts(): Readonly<AffectTable> {
        return this.result.rawCounts;
    }

    get frequencies(): Readonly<AffectTable> {
        return this.result.frequencies;
    }

    get totalWords(): number {
        return this.result.totalWords;
    }

    get topEmotions(): ReadonlyArray<readonly [AffectLabel, number]> {
        return this.result.topEmotions;
    }

    // ── Pipeline steps ───────────────────────────────────────────────

    tokenize(): string[] {
        return tokenize(this.text, { minTokenLength: this.settings.minTokenLength });
    }

    rootOf(token: string): string {
        return safeRootOf(this.rootReducer, token);
    }

    private analyze(): AnalysisResult {
        const tokens = this.tokenize();

        // ── Score ────────────────────────────────────────────────────
        const rawCounts = emptyAffectTable();
        const words: string[] = [];
        const affectList: AffectLabel[] = [];
        // Null prototype: lexicon words such as "constructor" are plain keys here.
        const affectDict: Record<string, readonly AffectLabel[]> = Object.create(null);

        for (const token of tokens) {
            const root = this.rootOf(token);

            // Root first; the surface form covers lexicons that list
            // inflected words the reducer would otherwise strip.
            let key = root;
            let labels = this.lexicon.get(root);
            if (!labels && root !== token) {
                labels = this.lexicon.get(token);
                if (labels) key = token;
            }

            words.push(key);
            if (!labels) continue;

            for (const label of labels) {
                rawCounts[label] += 1;
                affectList.push(label);
            }
            affectDict[key] = [...labels];
        }

        const totalWords = tokens.length;

        // ── Build frequencies ────────────────────────────────────────
        const frequencies = emptyAffectTable();
        const affectShares = emptyAffectTable();
        const affectHits = affectList.length;

        for (const label of AFFECT_LABELS) {
            frequencies[label] = totalWords > 0 ? rawCounts[label] / totalWords : 0;
            affectShares[label] = affectHits > 0 ? rawCounts[label] / affectHits : 0;
        }

        return {
            words,
            totalWords,
            rawCounts,
            frequencies,
            affectShares,
            affectList,
            affectDict,
            topEmotions: this.pickTopEmotions(frequencies),
        };
    }

    private pickTopEmotions(frequencies: AffectTable): Array<readonly [AffectLabel, number]> {
        const max = Math.max(...AFFECT_LABELS.map(label => frequencies[label]));
        if (max <= 0) return [];

        const top = AFFECT_LABELS
            .filter(label => frequencies[label] === max)
            .map(label => [label, max] as const);

        const limit = this.settings.topEmotionsLimit;
        return limit > 0 ? top.slice(0, limit) : top;
    }
}

/**
 * Analyze `text` against `lexicon` and return just the result.
 */
export function analyzeAffect(
    text: string,
    lexicon: Lexicon | null | undefined,
    options?: AnalyzerOptions,
): AnalysisResult {
    return new AffectAnalyzer(text, lexicon, options).result;
}
