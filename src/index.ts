/**
 * rtl-forge public API
 */

export * from './design_types';
export * from './structured_error';
export { createLogger, setLogLevel, getLogLevel, setCorrelation, clearCorrelation, withModuleCorrelation } from './logger';
export type { Logger, LogLevel } from './logger';
export { loadRunConfig, DEFAULTS, DEFAULT_CONFIG_FILE, DEFAULT_MODEL_ID } from './config';
export type { RunConfig, Provider, LoadConfigOptions } from './config';
export { SchemaValidator, formatValidationErrors } from './schema_validator';
export type { JsonSchema } from './schema_validator';
export { ModelRegistry } from './model_registry';
export { ModelRouter } from './model_router';
export type { ModelRouterConfig, ModelRequest, ModelResponse, ModelRouterError, FetchFn } from './model_router';
export { RouterGenerationClient } from './generation_client';
export type { GenerationClient, GenerateOptions } from './generation_client';
export type { GenerationPrompt, RepairEvidence } from './prompts';
export { extractCode, extractJson } from './response_parser';
export { PlanBuilder, validatePlan } from './plan_builder';
export { topologicalOrder, transitiveDependencies, transitiveDependents } from './plan_graph';
export { ModuleContext } from './module_context';
export type { ContextSnapshot } from './module_context';
export { ModuleGenerator } from './module_generator';
export type { CandidateGenerator, CandidateRequest, Candidate, RepairContext } from './module_generator';
export { ModuleVerifier } from './module_verifier';
export type { ModuleVerifierOptions, NodeVerificationRequest, VerifierState } from './module_verifier';
export { runProcess } from './process_runner';
export type { ProcessRunner, ProcessResult, ProcessOptions } from './process_runner';
export { IcarusVerificationRunner, SIMULATION_MARKERS, parseSimulationLog, interpretSimulation } from './verification_runner';
export type { VerificationRunner, VerificationInput, VerifyOptions, IcarusRunnerConfig } from './verification_runner';
export { CachingVerificationRunner, verificationKey } from './verification_cache';
export { classify, classifyOutcome, diagnoseFailure } from './diagnostic_classifier';
export { composeDesign, renderHierarchy } from './design_composer';
export { DesignOrchestrator } from './orchestrator';
export type { OrchestratorHooks, OrchestratorOptions, Planner, NodeVerifier } from './orchestrator';
export { RunLedger } from './run_ledger';
export type { RunRecord, ModuleRecord, AttemptRecord, RunStatus } from './run_ledger';
export { diffAttempts, unifiedDiff } from './attempt_diff';
export { DesignWriter, designSlug, timestampName } from './output_writer';
export { checkBackend, formatCheckReport } from './backend_check';
export type { BackendCheckOptions, BackendCheckResult } from './backend_check';
