import { logger } from '../logging/logger.js';
import type { FetchLike } from '../evaluators/httpEvaluators.js';
import type { EscalationCase } from './types.js';

export interface EscalationMessage {
    readonly escalationId: string;
    readonly sessionId: string;
    readonly targetRole: EscalationCase['targetRole'];
    readonly reasonCode: EscalationCase['reasonCode'];
    readonly contextPackage: EscalationCase['contextPackage'];
}

export interface EscalationNotifier {
    notify(message: EscalationMessage): Promise<{ delivered: boolean }>;
}

export function toMessage(escalation: EscalationCase): EscalationMessage {
    return {
        escalationId: escalation.escalationId,
        sessionId: escalation.sessionId,
        targetRole: escalation.targetRole,
        reasonCode: escalation.reasonCode,
        contextPackage: escalation.contextPackage
    };
}

/**
 * Writes the reviewer notification to the structured log. The context
 * package is redacted by the logger configuration.
 */
export class LoggingNotifier implements EscalationNotifier {
    private readonly log = logger.child({ component: 'escalation-notifier' });

    async notify(message: EscalationMessage): Promise<{ delivered: boolean }> {
        this.log.info({
            escalationId: message.escalationId,
            targetRole: message.targetRole,
            reasonCode: message.reasonCode,
            contextPackage: message.contextPackage
        }, 'Escalation ready for review');
        return { delivered: true };
    }
}

/**
 * Posts the notification to a reviewer inbox endpoint.
 */
export class WebhookNotifier implements EscalationNotifier {
    constructor(
        private readonly url: string,
        private readonly timeoutMs: number = 3000,
        private readonly fetchImpl: FetchLike = fetch
    ) { }

    async notify(message: EscalationMessage): Promise<{ delivered: boolean }> {
        const res = await this.fetchImpl(this.url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', 'Idempotency-Key': message.escalationId },
            body: JSON.stringify(message),
            signal: AbortSignal.timeout(this.timeoutMs)
        });
        return { delivered: res.ok };
    }
}
