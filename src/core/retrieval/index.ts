export * from './types';
export { QueryAnalyzer, buildDecomposition, createClassifier, determineSearchStrategy, summarizeDecomposition } from './analyzer';
export { HeuristicClassifier, LlmClassifier, classifyHeuristically, extractComparisonEntities } from './classifier';
export type { Classification, QueryClassifier } from './classifier';
export { DocTypeRegistry, GENERIC_DOC_TYPE } from './docTypes';
export type { DocTypeDefinition } from './docTypes';
export { DEFAULT_BOOSTS, DEFAULT_RRF_K, fuseByProvenance, fuseByReciprocalRank, meanTopScore } from './fuser';
export type { BoostTable } from './fuser';
export { HypotheticalRetriever, acceptFallback, evaluateActivation, shouldTriggerFallback } from './hyde';
export type { ActivationRule, HydeOptions } from './hyde';
export { MultihopCoordinator } from './multihop';
export { RetrievalRouter, parseRetrieveRequest } from './router';
export type { RouterCollaborators, RetrievalRouterOptions } from './router';
export { UsageStats } from './stats';
export type { UsageSnapshot } from './stats';
export { LruCache } from './cache';
export { detectStructuralReference } from './structural';
