export { DotfileLinker } from './dotfile-linker';
export { default } from './dotfile-linker';
export { MappingTable, buildMappingTable, loadDefinitions, parseTargetOverride, writeDefaultConfig } from './mapping-table';
export { detectPlatform, resolveConfigRoot } from './platform';
export { isVerbose, resolveSettings } from './settings';
export { Logger, createLogger } from './logger';
export * from './errors';
export * from './types';
export * from './constants';
