/**
 * affects.ts — The closed vocabulary of affect categories.
 *
 * WHAT IS AN AFFECT?
 * ──────────────────
 * An affect is an emotional category attached to lexicon words. The set is
 * fixed: eight basic emotions plus two polarity labels. Every lexicon entry,
 * every raw-count table and every frequency table is keyed by exactly
 * these ten labels, in this order.
 *
 *   fear, anger, anticipation, trust, surprise   ← basic emotions
 *   positive, negative                           ← polarity
 *   sadness, disgust, joy                        ← basic emotions
 *
 * The order matters only for presentation (tables, topEmotions ties).
 */

// ══════════════════════════════════════════════════════════════════════
// AFFECT LABELS
// ══════════════════════════════════════════════════════════════════════
export const AFFECT_LABELS = [
    'fear',
    'anger',
    'anticipation',
    'trust',
    'surprise',
    'positive',
    'negative',
    'sadness',
    'disgust',
    'joy',
] as const;

export type AffectLabel = typeof AFFECT_LABELS[number];

/** Per-affect numeric table. Always carries all ten labels. */
export type AffectTable = Record<AffectLabel, number>;

const LABEL_SET: ReadonlySet<string> = new Set(AFFECT_LABELS);

export function isAffectLabel(value: string): value is AffectLabel {
    return LABEL_SET.has(value);
}

/**
 * A fresh table with every label set to 0.
 * Callers own the returned object; it is never shared.
 */
export function emptyAffectTable(): AffectTable {
    return {
        fear: 0,
        anger: 0,
        anticipation: 0,
        trust: 0,
        surprise: 0,
        positive: 0,
        negative: 0,
        sadness: 0,
        disgust: 0,
        joy: 0,
    };
}
