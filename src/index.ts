/**
 * affect-lens — lexicon-based affect frequency analysis.
 */

export { AffectAnalyzer, analyzeAffect } from './services/AffectAnalyzer';
export type { AnalysisResult, AnalyzerOptions } from './services/AffectAnalyzer';

export { Lexicon } from './services/Lexicon';
export type { LexiconMapping } from './services/Lexicon';

export {
    StaticLexiconProvider,
    JsonFileLexiconProvider,
    BUILTIN_LEXICON_NAMES,
    loadBuiltinLexicon,
} from './services/LexiconProvider';
export type { LexiconProvider } from './services/LexiconProvider';

export {
    identityRoot,
    createLemmaReducer,
    createStemmerReducer,
    safeRootOf,
} from './services/RootReducer';
export type { RootReducer, WordStemmer } from './services/RootReducer';

export { tokenize, normalizeTokens } from './services/Tokenizer';
export type { TokenizeOptions } from './services/Tokenizer';

export { AnalyzerConfig, PARAM_DEFS, defaultSettings, defaultValueOf } from './services/AnalyzerConfig';
export type { AnalyzerSettings, ParamDef, ParamKey } from './services/AnalyzerConfig';

export { ConfigurationError } from './services/errors';

export { AFFECT_LABELS, isAffectLabel, emptyAffectTable } from './data/affects';
export type { AffectLabel, AffectTable } from './data/affects';
