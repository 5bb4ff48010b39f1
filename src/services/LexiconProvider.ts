/**
 * LexiconProvider — Where a Lexicon comes from.
 *
 * The analyzer never loads anything itself; it is handed a ready Lexicon.
 * Providers do the loading, once, and hand out the same instance on every
 * later load() so all analyzers in a process share one table.
 *
 *   StaticLexiconProvider: in-memory `{ word: label[] }` data
 *   JsonFileLexiconProvider: a JSON file on disk, same format
 *   loadBuiltinLexicon(): lexicons bundled with this package
 */

import { readFileSync } from 'node:fs';
import starterLexicon from '../data/affect-lexicon.json';
import { ConfigurationError } from './errors';
import { Lexicon } from './Lexicon';

export interface LexiconProvider {
    readonly name: string;
    load(): Lexicon;
}

export class StaticLexiconProvider implements LexiconProvider {
    readonly name: string;
    private readonly data: unknown;
    private cached: Lexicon | null = null;

    constructor(data: unknown, name = 'static') {
        this.data = data;
        this.name = name;
    }

    load(): Lexicon {
        if (!this.cached) {
            this.cached = Lexicon.fromRecord(this.data);
            console.log(`[LexiconProvider] Loaded ${this.name} (${this.cached.size} entries)`);
        }
        return this.cached;
    }
}

export class JsonFileLexiconProvider implements LexiconProvider {
    readonly name: string;
    private cached: Lexicon | null = null;

    constructor(readonly path: string) {
        this.name = `file:${path}`;
    }

    load(): Lexicon {
        if (this.cached) return this.cached;

        let raw: string;
        try {
            raw = readFileSync(this.path, 'utf8');
        } catch (err) {
            throw new ConfigurationError(`Cannot read lexicon file "${this.path}"`, { cause: err });
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (err) {
            throw new ConfigurationError(`Lexicon file "${this.path}" is not valid JSON`, { cause: err });
        }

        this.cached = Lexicon.fromRecord(data);
        console.log(`[LexiconProvider] Loaded ${this.name} (${this.cached.size} entries)`);
        return this.cached;
    }
}


// ══════════════════════════════════════════════════════════════════════
// BUILT-IN LEXICONS
// ══════════════════════════════════════════════════════════════════════
// "starter" is a small general-purpose lexicon bundled as JSON under
// src/data. Larger lexicons are loaded from disk with
// JsonFileLexiconProvider.
// ══════════════════════════════════════════════════════════════════════
const BUILTIN_PROVIDERS = new Map<string, LexiconProvider>([
    ['starter', new StaticLexiconProvider(starterLexicon, 'builtin:starter')],
]);

export const BUILTIN_LEXICON_NAMES: readonly string[] = [...BUILTIN_PROVIDERS.keys()];

export function loadBuiltinLexicon(name = 'starter'): Lexicon {
    const provider = BUILTIN_PROVIDERS.get(name);
    if (!provider) {
        throw new ConfigurationError(
            `Unknown built-in lexicon "${name}" (available: ${BUILTIN_LEXICON_NAMES.join(', ')})`,
        );
    }
    return provider.load();
}
