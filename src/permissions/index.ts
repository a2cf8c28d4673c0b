export * from './types.js';
export * from './dedupe.js';
export * from './merge.js';
export * from './extract.js';
export * from './emit.js';
export { SettingsError, SettingsErrorCode } from '../core/errors/index.js';
