/**
 * AffectAnalyzer.test.ts — Unit tests for the text → affect frequency pipeline.
 *
 * WHAT WE'RE TESTING:
 * ───────────────────
 *   1. Worked scenarios: matched words, unmatched words, punctuation
 *   2. Count/frequency invariants over a handful of texts
 *   3. Empty and non-word input produce a zero-filled result
 *   4. Root reduction: default lemma reducer, custom and failing reducers
 *   5. Pre-tokenized input (fromTokens)
 *   6. Supplementary views: affectList, affectDict, affectShares, topEmotions
 *   7. ConfigurationError for an absent or empty lexicon
 *
 * The lexicons here are tiny and built inline so expected counts can be
 * worked out by hand.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { AffectAnalyzer, analyzeAffect } from '../services/AffectAnalyzer';
import { AnalyzerConfig } from '../services/AnalyzerConfig';
import { ConfigurationError } from '../services/errors';
import { Lexicon } from '../services/Lexicon';
import { createStemmerReducer } from '../services/RootReducer';
import type { RootReducer } from '../services/RootReducer';
import { AFFECT_LABELS } from '../data/affects';

// ── FIXTURES ─────────────────────────────────────────────────────────

function scenarioLexicon(): Lexicon {
    return Lexicon.fromRecord({
        happy: ['joy', 'positive'],
        joyful: ['joy', 'positive'],
        fear: ['fear', 'negative'],
        joy: ['joy', 'positive', 'trust'],
    });
}

let lexicon: Lexicon;
let logSpy: MockInstance;

beforeEach(() => {
    logSpy = vi.spyOn(console, 'log');
    lexicon = scenarioLexicon();
});

afterEach(() => {
    logSpy.mockRestore();
});


// ══════════════════════════════════════════════════════════════════════
// SUITE 1: SCENARIOS
// ══════════════════════════════════════════════════════════════════════

describe('AffectAnalyzer — Scenarios', () => {
    it('counts each affect of each matched word', () => {
        const analyzer = new AffectAnalyzer('happy joyful fear', lexicon);

        expect(analyzer.totalWords).toBe(3);
        expect(analyzer.rawCounts).toEqual({
            fear: 1,
            anger: 0,
            anticipation: 0,
            trust: 0,
            surprise: 0,
            positive: 2,
            negative: 1,
            sadness: 0,
            disgust: 0,
            joy: 2,
        });
        expect(analyzer.frequencies.joy).toBeCloseTo(0.667, 3);
        expect(analyzer.frequencies.positive).toBeCloseTo(0.667, 3);
        expect(analyzer.frequencies.fear).toBeCloseTo(0.333, 3);
        expect(analyzer.frequencies.negative).toBeCloseTo(0.333, 3);
        expect(analyzer.frequencies.anger).toBe(0);
        expect(analyzer.frequencies.trust).toBe(0);
    });

    it('counts unmatched words toward the total only', () => {
        const analyzer = new AffectAnalyzer('the and of', lexicon);

        expect(analyzer.totalWords).toBe(3);
        for (const label of AFFECT_LABELS) {
            expect(analyzer.rawCounts[label]).toBe(0);
            expect(analyzer.frequencies[label]).toBe(0);
        }
    });

    it('strips punctuation and case before lookup', () => {
        const analyzer = new AffectAnalyzer('Fear! Joy.', lexicon);

        expect(analyzer.result.words).toEqual(['fear', 'joy']);
        expect(analyzer.totalWords).toBe(2);
        expect(analyzer.rawCounts.fear).toBe(1);
        expect(analyzer.rawCounts.negative).toBe(1);
        expect(analyzer.rawCounts.joy).toBe(1);
        expect(analyzer.rawCounts.positive).toBe(1);
        expect(analyzer.rawCounts.trust).toBe(1);
        expect(analyzer.frequencies.fear).toBe(0.5);
    });

    it('writes nothing to the console without a config', () => {
        new AffectAnalyzer('happy joyful fear', lexicon);
        AffectAnalyzer.fromTokens(['fear'], lexicon);
        analyzeAffect('joy', lexicon);
        expect(logSpy).not.toHaveBeenCalled();
    });

    it('analyzeAffect returns the same result as the class', () => {
        const viaFunction = analyzeAffect('happy joyful fear', lexicon);
        const viaClass = new AffectAnalyzer('happy joyful fear', lexicon).result;
        expect(viaFunction).toEqual(viaClass);
    });
});


// ══════════════════════════════════════════════════════════════════════
// SUITE 2: INVARIANTS
// ══════════════════════════════════════════════════════════════════════

describe('AffectAnalyzer — Invariants', () => {
    const texts = [
        'happy joyful fear',
        'Fear, fear and more FEAR!!!',
        'joy? 42 joy... happy-go-lucky',
        'nothing here matches at all',
        '',
    ];

    it('never counts an affect more often than there are words', () => {
        for (const text of texts) {
            const { rawCounts, totalWords } = new AffectAnalyzer(text, lexicon).result;
            expect(totalWords).toBeGreaterThanOrEqual(0);
            for (const label of AFFECT_LABELS) {
                expect(rawCounts[label]).toBeLessThanOrEqual(totalWords);
            }
        }
    });

    it('frequency is rawCount / totalWords, or 0 for no words', () => {
        for (const text of texts) {
            const { rawCounts, frequencies, totalWords } = new AffectAnalyzer(text, lexicon).result;
            for (const label of AFFECT_LABELS) {
                const expected = totalWords > 0 ? rawCounts[label] / totalWords : 0;
                expect(frequencies[label]).toBe(expected);
            }
        }
    });

    it('total equals the number of alphabetic tokens', () => {
        // joy | joy | happy | go | lucky  (42 and punctuation dropped)
        expect(new AffectAnalyzer('joy? 42 joy... happy-go-lucky', lexicon).totalWords).toBe(5);
    });

    it('gives identical results for repeated analyses', () => {
        const first = new AffectAnalyzer('Fear, fear and more FEAR!!!', lexicon).result;
        const second = new AffectAnalyzer('Fear, fear and more FEAR!!!', lexicon).result;
        expect(second).toEqual(first);
    });

    it('does not modify the shared lexicon', () => {
        const before = [...lexicon.entries()].map(([word, labels]) => [word, [...labels]]);
        new AffectAnalyzer('happy joyful fear fears', lexicon);
        const after = [...lexicon.entries()].map(([word, labels]) => [word, [...labels]]);
        expect(after).toEqual(before);
    });
});


// ══════════════════════════════════════════════════════════════════════
// SUITE 3: EMPTY AND NON-WORD INPUT
// ══════════════════════════════════════════════════════════════════════

describe('AffectAnalyzer — Empty Input', () => {
    it('returns a zero-filled result for empty text', () => {
        const { result } = new AffectAnalyzer('', lexicon);

        expect(result.totalWords).toBe(0);
        expect(result.words).toEqual([]);
        expect(result.affectList).toEqual([]);
        expect(result.topEmotions).toEqual([]);
        for (const label of AFFECT_LABELS) {
            expect(result.rawCounts[label]).toBe(0);
            expect(result.frequencies[label]).toBe(0);
            expect(result.affectShares[label]).toBe(0);
        }
    });

    it('treats digits and symbols as no words at all', () => {
        const analyzer = new AffectAnalyzer('123 !!! ... 4.5 $$$', lexicon);
        expect(analyzer.totalWords).toBe(0);
        expect(analyzer.frequencies.joy).toBe(0);
    });

    it('counts non-English words without matching them', () => {
        const analyzer = new AffectAnalyzer('alegría miedo', lexicon);
        expect(analyzer.totalWords).toBe(2);
        expect(analyzer.result.affectList).toEqual([]);
    });
});


// ══════════════════════════════════════════════════════════════════════
// SUITE 4: ROOT REDUCTION
// ══════════════════════════════════════════════════════════════════════

describe('AffectAnalyzer — Root Reduction', () => {
    it('matches inflected forms through the default reducer', () => {
        const analyzer = new AffectAnalyzer("Fears. Joy's. Hoped", Lexicon.fromRecord({
            fear: ['fear'],
            joy: ['joy'],
            hope: ['anticipation'],
        }));

        expect(analyzer.result.words).toEqual(['fear', 'joy', 'hope']);
        expect(analyzer.rawCounts.fear).toBe(1);
        expect(analyzer.rawCounts.joy).toBe(1);
        expect(analyzer.rawCounts.anticipation).toBe(1);
    });

    it('does not match a word against a shorter unrelated entry', () => {
        const analyzer = new AffectAnalyzer('feed the cat', Lexicon.fromRecord({
            fee: ['anger', 'negative'],
        }));

        expect(analyzer.result.words).toEqual(['feed', 'the', 'cat']);
        expect(analyzer.rawCounts.anger).toBe(0);
        expect(analyzer.result.affectDict).toEqual({});
    });

    it('falls back to the surface token when the root is not listed', () => {
        const chop: RootReducer = { name: 'chop', rootOf: word => word.slice(0, -1) };
        const analyzer = new AffectAnalyzer('fears', Lexicon.fromRecord({ fears: ['fear'] }), {
            rootReducer: chop,
        });

        expect(analyzer.result.words).toEqual(['fears']);
        expect(analyzer.rawCounts.fear).toBe(1);
        expect(analyzer.result.affectDict).toEqual({ fears: ['fear'] });
    });

    it('uses the token itself when the reducer throws', () => {
        const broken: RootReducer = {
            name: 'broken',
            rootOf: () => { throw new Error('no root'); },
        };
        const analyzer = new AffectAnalyzer('happy fear', lexicon, { rootReducer: broken });

        expect(analyzer.totalWords).toBe(2);
        expect(analyzer.rawCounts.joy).toBe(1);
        expect(analyzer.rawCounts.fear).toBe(1);
    });

    it('uses the token itself when the reducer returns an empty root', () => {
        const empty: RootReducer = { name: 'empty', rootOf: () => '' };
        const analyzer = new AffectAnalyzer('joyful', lexicon, { rootReducer: empty });
        expect(analyzer.rootOf('joyful')).toBe('joyful');
        expect(analyzer.rawCounts.joy).toBe(1);
    });

    it('works with a Porter stemmer against a re-keyed lexicon', () => {
        const porter = createStemmerReducer();
        const stemmed = Lexicon.fromRecord({
            fear: ['fear', 'negative'],
            cheer: ['joy', 'positive'],
        }).reduceKeys(porter);

        const analyzer = new AffectAnalyzer('Fears cheering', stemmed, { rootReducer: porter });

        expect(analyzer.result.words).toEqual(['fear', 'cheer']);
        expect(analyzer.rawCounts.fear).toBe(1);
        expect(analyzer.rawCounts.joy).toBe(1);
    });
});


// ══════════════════════════════════════════════════════════════════════
// SUITE 5: PRE-TOKENIZED INPUT
// ══════════════════════════════════════════════════════════════════════

describe('AffectAnalyzer — fromTokens', () => {
    it('lowercases tokens and drops non-words', () => {
        const analyzer = AffectAnalyzer.fromTokens(['Happy', 'FEAR!', '', 'joyful', '42'], lexicon);

        expect(analyzer.result.words).toEqual(['happy', 'joyful']);
        expect(analyzer.totalWords).toBe(2);
        expect(analyzer.rawCounts.joy).toBe(2);
        expect(analyzer.frequencies.positive).toBe(1);
    });

    it('does not reduce caller-supplied tokens', () => {
        const analyzer = AffectAnalyzer.fromTokens(['fears'], lexicon);
        expect(analyzer.result.words).toEqual(['fears']);
        expect(analyzer.rawCounts.fear).toBe(0);
    });
});


// ══════════════════════════════════════════════════════════════════════
// SUITE 6: DETAIL VIEWS
// ══════════════════════════════════════════════════════════════════════

describe('AffectAnalyzer — Detail Views', () => {
    it('lists contributed affects in order', () => {
        const { affectList } = new AffectAnalyzer('fear happy', lexicon).result;
        expect(affectList).toEqual(['fear', 'negative', 'positive', 'joy']);
    });

    it('maps each matched word to its labels', () => {
        const { affectDict } = new AffectAnalyzer('fear the happy fear', lexicon).result;
        expect(affectDict).toEqual({
            fear: ['fear', 'negative'],
            happy: ['positive', 'joy'],
        });
    });

    it('keeps lexicon words named like object members as plain keys', () => {
        const odd = Lexicon.fromRecord({ constructor: ['surprise'] });
        const { affectDict, rawCounts } = new AffectAnalyzer('constructor', odd).result;
        expect(affectDict.constructor).toEqual(['surprise']);
        expect(rawCounts.surprise).toBe(1);
    });

    it('reports each affect share of all affect hits', () => {
        // 6 hits: joy 2, positive 2, fear 1, negative 1
        const { affectShares } = new AffectAnalyzer('happy joyful fear the', lexicon).result;
        expect(affectShares.joy).toBe(2 / 6);
        expect(affectShares.fear).toBe(1 / 6);
        expect(affectShares.anger).toBe(0);
    });

    it('reports every affect tied for the top frequency', () => {
        const { topEmotions } = new AffectAnalyzer('happy joyful fear', lexicon).result;
        expect(topEmotions).toEqual([
            ['positive', 2 / 3],
            ['joy', 2 / 3],
        ]);
    });

    it('caps topEmotions with topEmotionsLimit', () => {
        logSpy.mockImplementation(() => {});
        const config = new AnalyzerConfig();
        config.set('topEmotionsLimit', 1);
        const analyzer = new AffectAnalyzer('happy joyful fear', lexicon, { config });
        expect(analyzer.topEmotions).toEqual([['positive', 2 / 3]]);
    });

    it('drops short tokens with minTokenLength', () => {
        logSpy.mockImplementation(() => {});
        const config = new AnalyzerConfig();
        config.set('minTokenLength', 4);
        const analyzer = new AffectAnalyzer('I am so joyful', lexicon, { config });
        expect(analyzer.tokenize()).toEqual(['joyful']);
        expect(analyzer.totalWords).toBe(1);
        expect(analyzer.frequencies.joy).toBe(1);
    });
});


// ══════════════════════════════════════════════════════════════════════
// SUITE 7: CONFIGURATION ERRORS
// ══════════════════════════════════════════════════════════════════════

describe('AffectAnalyzer — Configuration Errors', () => {
    it('rejects a missing lexicon', () => {
        expect(() => new AffectAnalyzer('happy', null)).toThrow(ConfigurationError);
        expect(() => new AffectAnalyzer('happy', undefined)).toThrow(
            'AffectAnalyzer requires a loaded lexicon, got none',
        );
    });

    it('rejects an empty lexicon', () => {
        expect(() => new AffectAnalyzer('happy', Lexicon.fromRecord({}))).toThrow(
            'AffectAnalyzer requires a non-empty lexicon',
        );
    });

    it('rejects a missing lexicon for pre-tokenized input too', () => {
        expect(() => AffectAnalyzer.fromTokens(['happy'], null)).toThrow(ConfigurationError);
    });
});
