/**
 * Lexicon — Immutable word-root → affect-label mapping.
 *
 * WHAT THIS IS:
 * ─────────────
 * The lookup table the AffectAnalyzer scores against. Each key is a
 * lowercase word (or word root); each value is the set of affect labels
 * associated with it. A word may carry zero, one or several labels:
 *
 *   "happy"  → { joy, positive }
 *   "wait"   → { anticipation, negative }
 *   "stone"  → { }                 ← known word, no affect
 *
 * A Lexicon is built once and never written to afterwards, so a single
 * instance can be shared by any number of analyzers.
 *
 * ON-DISK FORMAT:
 * ───────────────
 * A JSON object whose keys are words and whose values are arrays of
 * affect labels:
 *
 *   { "fear": ["fear", "negative"], "joy": ["joy", "positive", "trust"] }
 *
 * Labels outside the closed vocabulary (see data/affects.ts) are rejected.
 */

import { z } from 'zod';
import { AFFECT_LABELS } from '../data/affects';
import type { AffectLabel } from '../data/affects';
import { ConfigurationError, formatIssues } from './errors';
import { safeRootOf } from './RootReducer';
import type { RootReducer } from './RootReducer';

export type LexiconMapping = ReadonlyMap<string, ReadonlySet<AffectLabel>>;

const lexiconRecordSchema = z.record(z.string(), z.array(z.enum(AFFECT_LABELS)));

// Labels are stored in vocabulary order so iteration is deterministic
// regardless of how the source data listed them.
function orderedLabels(labels: Iterable<AffectLabel>): ReadonlySet<AffectLabel> {
    const present = new Set(labels);
    return new Set(AFFECT_LABELS.filter(label => present.has(label)));
}

function mergeInto(
    entries: Map<string, ReadonlySet<AffectLabel>>,
    word: string,
    labels: Iterable<AffectLabel>,
): void {
    const existing = entries.get(word);
    entries.set(word, orderedLabels(existing ? [...existing, ...labels] : labels));
}

function normalizeKey(word: string): string {
    return word.trim().toLowerCase();
}

export class Lexicon {
    private readonly table: Map<string, ReadonlySet<AffectLabel>>;

    private constructor(entries: Map<string, ReadonlySet<AffectLabel>>) {
        this.table = entries;
    }

    /**
     * Build from `{ word: label[] }` data, typically parsed JSON.
     * Keys are trimmed and lower-cased; keys that collide after that
     * have their label lists merged.
     */
    static fromRecord(data: unknown): Lexicon {
        const parsed = lexiconRecordSchema.safeParse(data);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid lexicon data: ${formatIssues(parsed.error)}`);
        }

        const entries = new Map<string, ReadonlySet<AffectLabel>>();
        for (const [word, labels] of Object.entries(parsed.data)) {
            const key = normalizeKey(word);
            if (key.length === 0) continue;
            mergeInto(entries, key, labels);
        }
        return new Lexicon(entries);
    }

    /**
     * Wrap an existing mapping. The mapping is copied, not referenced, and
     * keys are normalized as in fromRecord.
     */
    static fromMapping(mapping: LexiconMapping): Lexicon {
        const entries = new Map<string, ReadonlySet<AffectLabel>>();
        for (const [word, labels] of mapping) {
            const key = normalizeKey(word);
            if (key.length === 0) continue;
            mergeInto(entries, key, labels);
        }
        return new Lexicon(entries);
    }

    get size(): number {
        return this.table.size;
    }

    has(word: string): boolean {
        return this.table.has(word);
    }

    /** Affect labels for a word, or undefined if the word is not listed. */
    get(word: string): ReadonlySet<AffectLabel> | undefined {
        return this.table.get(word);
    }

    entries(): IterableIterator<[string, ReadonlySet<AffectLabel>]> {
        return this.table.entries();
    }

    /**
     * A new Lexicon keyed by each word's root. Words sharing a root have
     * their labels merged, e.g. with a Porter stemmer "happy" and
     * "happiness" both land on "happi".
     */
    reduceKeys(reducer: RootReducer): Lexicon {
        const entries = new Map<string, ReadonlySet<AffectLabel>>();
        for (const [word, labels] of this.table) {
            mergeInto(entries, safeRootOf(reducer, word), labels);
        }
        return new Lexicon(entries);
    }
}
