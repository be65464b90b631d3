/**
 * Barrel export for all shared types.
 */
export { DEFAULT_CONFIG, STAGE_NAMES, SYNTHETIC_KINDS } from './config.js';
export type {
    EtlConfig,
    EtlConfigInput,
    DownloadConfig,
    HttpConfig,
    SynthesizeConfig,
    LoadConfig,
    LogLevel,
    StageName,
    SyntheticKind,
    MalformedRecordPolicy,
    TrackerBackend,
} from './config.js';
export type { ScholarlySource, SourceOptions, PaperSearchQuery, SearchPage } from './source-adapter.js';
