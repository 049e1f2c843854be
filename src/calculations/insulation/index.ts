/**
 * Insulation Calculations - Main Export
 */

export * from './geometry';
export * from './config';
export * from './specs';
export * from './materials';
export * from './labor';
export * from './bom';
export * from './quote';
export * from './scope';
export * from './alternatives';
export * from './orchestrator';
