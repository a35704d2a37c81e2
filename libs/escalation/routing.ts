import type { EscalationReasonCode } from '../workflow/types.js';
import type { TargetRole } from './types.js';

/**
 * Static routing table: clinical risk goes to a physician, process and
 * availability problems to a physician assistant.
 */
export const ESCALATION_ROUTING: Readonly<Record<EscalationReasonCode, TargetRole>> = {
    LOW_CONFIDENCE: 'PHYSICIAN_ASSISTANT',
    IDENTITY_VERIFICATION_FAILED: 'PHYSICIAN_ASSISTANT',
    BACKEND_UNAVAILABLE: 'PHYSICIAN_ASSISTANT',
    MAX_RETRIES_EXCEEDED: 'PHYSICIAN_ASSISTANT',
    MAJOR_DRUG_INTERACTION: 'PHYSICIAN',
    ALLERGY_MATCH: 'PHYSICIAN',
    CONTROLLED_SUBSTANCE: 'PHYSICIAN',
    EVALUATOR_ESCALATION: 'PHYSICIAN',
    PRIOR_AUTHORIZATION_REQUIRED: 'PHYSICIAN'
};

export function routeEscalation(reasonCode: EscalationReasonCode): TargetRole {
    return ESCALATION_ROUTING[reasonCode];
}
