/**
 * Floorline Decision Engine - Index
 * Public API exports
 */

// Types
export * from './types';

// Configuration
export { CONFIG } from './config';

// Math utilities
export * from './math';

// Core modules
export * from './historyWindow';
export * from './floor';
export * from './lineMatcher';
export * from './admission';
export * from './ranker';
export * from './pick';
export * from './analyze';

// Main pipeline
export { ScanPipeline, createScanStats } from './scanPipeline';
export type { ScanDependencies } from './scanPipeline';

// Explainability
export * from './explain';
