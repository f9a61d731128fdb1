/**
 * Library entry point
 */

export * from './domain/types.js';
export * from './domain/errors.js';
export { ProductCatalog, type ProductAlias } from './catalog/catalog.js';
export { buildDataset, loadDataset, parseDataset, type LoadedDataset } from './catalog/loader.js';
export { SearchEngine } from './pipeline/search.js';
export { DosageCalculator } from './pipeline/dosage.js';
export { InteractionChecker, assessPatient } from './pipeline/interactions.js';
export { CoverageAdvisor, estimateOutOfPocket } from './pipeline/coverage.js';
export { classifyQuery, type Classification } from './pipeline/classify.js';
export { Orchestrator, RequestStateMachine, withNarrative, type OrchestratorDeps } from './pipeline/orchestrator.js';
export { formatResponseText, summarizeResponse } from './pipeline/export.js';
export { renderResponse, createRenderClient, type RenderClient, type RenderOutcome } from './llm/render.js';
export { resolveConfig, DISCLAIMER, type AppConfig } from './config/defaults.js';
