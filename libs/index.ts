/**
 * Public surface of the refill workflow library.
 */

export * from './workflow/states.js';
export * from './workflow/types.js';
export { advance, continuesWithinTurn, SAFETY_EVALUATORS, BACKEND_EVALUATORS } from './workflow/transitionEngine.js';
export { applyDirectives } from './workflow/sessionReducer.js';
export { Prompts } from './workflow/prompts.js';
export { evaluateBreakers, BREAKER_RULES } from './safety/breakerPolicy.js';
export { classifyCandidates, DisambiguationEvaluator, type DisambiguationResolver } from './safety/disambiguation.js';

export { loadWorkflowConfig, DEFAULT_WORKFLOW_CONFIG, type WorkflowConfig, type EngineConfig } from './bootstrap/config/workflow-config.js';
export { bootstrap } from './bootstrap/startup.js';

export { SessionController, type SessionControllerDeps, type VerdictSource } from './controller/sessionController.js';
export { createRefillApp, type RefillAppDeps } from './http/refillRouter.js';

export type { SessionStore } from './session/store.js';
export { InMemorySessionStore } from './session/memoryStore.js';
export { PgSessionStore } from './session/pgStore.js';
export { KeyedMutex } from './session/lock.js';

export type { AuditLog } from './audit/auditLog.js';
export { InMemoryAuditLog } from './audit/auditLog.js';
export { PgAuditLog } from './audit/pgAuditLog.js';
export { verifyAuditChain } from './audit/integrity.js';
export type { AuditRecord } from './audit/schema.js';

export { EscalationCoordinator, type HandoffCompleter } from './escalation/coordinator.js';
export { InMemoryEscalationRepository, type EscalationRepository } from './escalation/repository.js';
export { PgEscalationRepository } from './escalation/pgRepository.js';
export { LoggingNotifier, WebhookNotifier, type EscalationNotifier } from './escalation/notifier.js';
export type { EscalationCase } from './escalation/types.js';

export type { Evaluator, EvaluatorRegistry, EvaluationRequest } from './evaluators/contracts.js';
export { EvaluatorInvoker } from './evaluators/invoker.js';
export { createHttpEvaluatorRegistry } from './evaluators/httpEvaluators.js';

export * from './errors/workflowErrors.js';
export { RefillSystemError, ErrorSanitizer } from './errors/sanitizer.js';
