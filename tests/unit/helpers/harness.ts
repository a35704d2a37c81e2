import { InMemoryAuditLog, type AuditLog } from '../../../libs/audit/auditLog.js';
import { DEFAULT_WORKFLOW_CONFIG, type WorkflowConfig } from '../../../libs/bootstrap/config/workflow-config.js';
import { SessionController } from '../../../libs/controller/sessionController.js';
import { EscalationCoordinator } from '../../../libs/escalation/coordinator.js';
import type { EscalationMessage, EscalationNotifier } from '../../../libs/escalation/notifier.js';
import { InMemoryEscalationRepository, type EscalationRepository } from '../../../libs/escalation/repository.js';
import { EvaluatorInvoker } from '../../../libs/evaluators/invoker.js';
import { InMemorySessionStore } from '../../../libs/session/memoryStore.js';
import type { SessionStore } from '../../../libs/session/store.js';
import type { EvaluatorName, EvaluatorVerdict } from '../../../libs/workflow/types.js';
import { T0, scriptedRegistry, type ScriptedRegistry } from './fixtures.js';

export class InboxNotifier implements EscalationNotifier {
    readonly messages: EscalationMessage[] = [];

    async notify(message: EscalationMessage): Promise<{ delivered: boolean }> {
        this.messages.push(message);
        return { delivered: true };
    }
}

export interface Harness {
    readonly controller: SessionController;
    readonly coordinator: EscalationCoordinator;
    readonly invoker: EvaluatorInvoker;
    readonly store: InMemorySessionStore;
    readonly auditLog: InMemoryAuditLog;
    readonly escalations: InMemoryEscalationRepository;
    readonly registry: ScriptedRegistry;
    readonly inbox: InboxNotifier;
    readonly clock: { now: Date };
}

export interface HarnessOptions {
    readonly verdicts?: Partial<Record<EvaluatorName, EvaluatorVerdict>>;
    readonly config?: WorkflowConfig;
    /** Wrap the real store, audit log or case repository to inject failures. */
    readonly wrapStore?: (store: SessionStore) => SessionStore;
    readonly wrapAuditLog?: (log: AuditLog) => AuditLog;
    readonly wrapEscalations?: (repository: EscalationRepository) => EscalationRepository;
}

/**
 * The full turn pipeline wired with in-process stand-ins and a settable clock.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
    const clock = { now: T0 };
    const now = () => clock.now;
    const config = options.config ?? DEFAULT_WORKFLOW_CONFIG;

    const registry = scriptedRegistry(options.verdicts);
    const invoker = new EvaluatorInvoker(registry, config);
    const store = new InMemorySessionStore({ now });
    const auditLog = new InMemoryAuditLog();
    const inbox = new InboxNotifier();
    const escalations = new InMemoryEscalationRepository();
    let ids = 0;
    const coordinator = new EscalationCoordinator(options.wrapEscalations ? options.wrapEscalations(escalations) : escalations, inbox, {
        now,
        newId: () => `00000000-0000-4000-8000-${String(++ids).padStart(12, '0')}`
    });

    const controller = new SessionController({
        store: options.wrapStore ? options.wrapStore(store) : store,
        auditLog: options.wrapAuditLog ? options.wrapAuditLog(auditLog) : auditLog,
        evaluators: invoker,
        coordinator,
        config,
        now
    });

    return { controller, coordinator, invoker, store, auditLog, escalations, registry, inbox, clock };
}

export function turn(sequence: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        sessionId: 'sess-1',
        rawUtterance: 'I need a refill of my lisinopril, thirty tablets',
        intent: 'RequestRefill',
        confidence: 0.97,
        extractedEntities: { drug: 'Lisinopril', qty: 30 },
        turnSequence: sequence,
        ...overrides
    };
}
