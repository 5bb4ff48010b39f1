/**
 * AnalyzerConfig — Tunable parameters for affect analysis.
 *
 * HOW IT WORKS:
 * ─────────────
 * 1. Each parameter has a key, default value, min, max, step, and label.
 * 2. The analyzer copies the values (toJSON) when it is constructed;
 *    without a config it uses defaultSettings().
 * 3. config.set('key', value) clamps to [min, max], snaps to the step,
 *    and notifies listeners.
 * 4. Given a storage path, values are loaded from that JSON file on
 *    construction and written back after every set().
 * 5. toJSON()/fromJSON() move the whole parameter set in and out.
 *
 * One config can be shared by many analyzers; each analysis reads the
 * values current at the time it runs.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, formatIssues } from './errors';

// ── PARAMETER DEFINITION ─────────────────────────────────────────────
export type ParamKey = 'minTokenLength' | 'topEmotionsLimit';

export interface ParamDef {
    key: ParamKey;         // Unique identifier
    label: string;         // Human-readable label
    defaultValue: number;  // Initial value and reset target
    min: number;
    max: number;
    step: number;          // Values snap to multiples of this
    group: string;
}

export const PARAM_DEFS: ParamDef[] = [
    // ── TOKENIZATION ────────────────────────────────────────────────
    {
        // 1 keeps every alphabetic token, so the word total equals the
        // number of words in the text. Raise it to ignore "a", "I", etc.
        key: 'minTokenLength', label: 'Minimum Token Length',
        defaultValue: 1, min: 1, max: 20, step: 1,
        group: 'Tokenization'
    },

    // ── REPORTING ───────────────────────────────────────────────────
    {
        // 0 = report every affect tied for the top frequency.
        key: 'topEmotionsLimit', label: 'Top Emotions Limit',
        defaultValue: 0, min: 0, max: 10, step: 1,
        group: 'Reporting'
    },
];

export type AnalyzerSettings = Record<ParamKey, number>;

export function defaultValueOf(key: ParamKey): number {
    return PARAM_DEFS.find(d => d.key === key)?.defaultValue ?? 0;
}

/** Parameter defaults as plain values, for analyses run without a config. */
export function defaultSettings(): AnalyzerSettings {
    return {
        minTokenLength: defaultValueOf('minTokenLength'),
        topEmotionsLimit: defaultValueOf('topEmotionsLimit'),
    };
}

// Unknown keys are stripped by z.object, which is what fromJSON wants.
const configJsonSchema = z.object({
    minTokenLength: z.number().finite().optional(),
    topEmotionsLimit: z.number().finite().optional(),
});

// ── LISTENER TYPE ────────────────────────────────────────────────────
type ConfigListener = (key: ParamKey, value: number) => void;

// ── ANALYZER CONFIG CLASS ────────────────────────────────────────────
export class AnalyzerConfig {
    private values: Map<ParamKey, number> = new Map();
    private listeners: Set<ConfigListener> = new Set();
    private readonly storagePath: string | undefined;

    constructor(storagePath?: string) {
        for (const def of PARAM_DEFS) {
            this.values.set(def.key, def.defaultValue);
        }

        this.storagePath = storagePath;
        if (storagePath !== undefined && existsSync(storagePath)) {
            this.loadFromFile(storagePath);
        }

        console.log('[AnalyzerConfig] Initialized with', this.values.size, 'parameters');
    }

    // ── GET / SET ────────────────────────────────────────────────────

    get(key: ParamKey): number {
        return this.values.get(key) ?? this.getDefault(key);
    }

    /**
     * Set a parameter value, clamped and snapped to its definition.
     * Non-finite values are rejected with a warning and leave the
     * parameter unchanged.
     */
    set(key: ParamKey, value: number): void {
        if (!Number.isFinite(value)) {
            console.warn(`[AnalyzerConfig] Ignoring non-finite value for "${key}":`, value);
            return;
        }
        const normalized = this.normalize(key, value);
        this.values.set(key, normalized);

        for (const listener of this.listeners) {
            listener(key, normalized);
        }

        if (this.storagePath !== undefined) {
            this.saveToFile(this.storagePath);
        }
    }

    get minTokenLength(): number {
        return this.get('minTokenLength');
    }

    get topEmotionsLimit(): number {
        return this.get('topEmotionsLimit');
    }

    // ── LISTENER MANAGEMENT ──────────────────────────────────────────

    /**
     * Subscribe to all config changes. Returns an unsubscribe function.
     */
    onChange(listener: ConfigListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    // ── DEFAULTS & RESET ─────────────────────────────────────────────

    getDefault(key: ParamKey): number {
        return defaultValueOf(key);
    }

    /**
     * Reset ALL parameters to their defaults.
     * Notifies listeners for each parameter.
     */
    resetAll(): void {
        for (const def of PARAM_DEFS) {
            this.values.set(def.key, def.defaultValue);
            for (const listener of this.listeners) {
                listener(def.key, def.defaultValue);
            }
        }
        if (this.storagePath !== undefined) {
            this.saveToFile(this.storagePath);
        }
        console.log('[AnalyzerConfig] All parameters reset to defaults');
    }

    // ── SERIALIZATION ────────────────────────────────────────────────

    toJSON(): AnalyzerSettings {
        return {
            minTokenLength: this.get('minTokenLength'),
            topEmotionsLimit: this.get('topEmotionsLimit'),
        };
    }

    /**
     * Import values from a plain object. Only known keys are applied;
     * anything else is ignored. Values of the wrong type are a
     * ConfigurationError and nothing is applied.
     */
    fromJSON(json: unknown): void {
        const parsed = configJsonSchema.safeParse(json);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid analyzer config: ${formatIssues(parsed.error)}`);
        }
        for (const def of PARAM_DEFS) {
            const value = parsed.data[def.key];
            if (value !== undefined) {
                this.values.set(def.key, this.normalize(def.key, value));
                for (const listener of this.listeners) {
                    listener(def.key, this.get(def.key));
                }
            }
        }
    }

    // ── FILE PERSISTENCE ─────────────────────────────────────────────

    loadFromFile(path: string): void {
        let raw: string;
        try {
            raw = readFileSync(path, 'utf8');
        } catch (err) {
            throw new ConfigurationError(`Cannot read analyzer config "${path}"`, { cause: err });
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (err) {
            throw new ConfigurationError(`Analyzer config "${path}" is not valid JSON`, { cause: err });
        }

        this.fromJSON(json);
        console.log('[AnalyzerConfig] Loaded config from', path);
    }

    saveToFile(path: string): void {
        try {
            writeFileSync(path, JSON.stringify(this.toJSON(), null, 2) + '\n', 'utf8');
        } catch (err) {
            throw new ConfigurationError(`Cannot write analyzer config "${path}"`, { cause: err });
        }
    }

    private normalize(key: ParamKey, value: number): number {
        const def = PARAM_DEFS.find(d => d.key === key);
        if (!def) return value;
        const snapped = Math.round(value / def.step) * def.step;
        return Math.max(def.min, Math.min(def.max, snapped));
    }
}
