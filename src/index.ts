// src/index.ts

export * from './schema';
export {generateGroupfile} from './core/generate-groupfile';
export type {
    GenerateGroupfileInput,
    GenerateGroupfileOptions,
    GenerateGroupfileResult,
} from './core/generate-groupfile';
export {renderGroupfile, parseGroupfile} from './core/groupfile';
export type {RenderGroupfileInput, ParsedGroupfile} from './core/groupfile';
export {inspectGroupfile} from './core/inspect-groupfile';
export type {InspectGroupfileResult, MissingReference} from './core/inspect-groupfile';
export {buildReplicaArgs, coordExtension, coordName, enumerateReplicas} from './core/replicas';
export {resolveGenerateInput, parseReplicaCount} from './core/resolve-inputs';
export type {GenerateCliValues} from './core/resolve-inputs';
export {loadGroupfileConfig} from './core/config-loader';
export {initConfig} from './core/init-config';
export {runOnce, resolveRun, generateResolved} from './core/runner';
export type {RunOptions, RunResult, ResolvedRun} from './core/runner';
export {watchGroupfile, createRunScheduler} from './core/watcher';
export type {WatchOptions, WatchRunOutcome, GroupfileWatcher, RunScheduler} from './core/watcher';
export {
    GroupfileError,
    PreconditionError,
    GenerationIoError,
    ConfigError,
} from './core/errors';
export type {GenerateStep} from './core/errors';
export {Logger, defaultLogger} from './util/logger';
export type {LogLevel, LoggerOptions} from './util/logger';
