import type { WorkflowState } from './states.js';

/**
 * User-facing prompt text. Prompts never echo entity values other than
 * drug candidate names, which the user needs to make a selection.
 */

const SLOT_PROMPTS: Readonly<Record<string, string>> = {
    drug: 'Which medication would you like to refill?',
    qty: 'How many units do you need? Please give a whole number between 1 and 365.',
    dose: 'What dose is printed on your current prescription (for example 10 mg)?',
    patient_id: 'Please confirm your patient ID (6 to 8 digits).'
};

const STATUS_PROMPTS: Readonly<Record<WorkflowState, string>> = {
    COLLECT_REQUEST: 'We are still collecting the details of your refill request.',
    SAFETY_CHECK: 'Your request is being checked for safety.',
    BACKEND_CHECK: 'We are checking pharmacy availability for your request.',
    DISPENSED: 'Your refill has been placed.',
    PA_APPROVAL_NEEDED: 'Your refill needs prior authorization.',
    ESCALATE_HANDOFF: 'Your request is with a clinician for review.',
    ESCALATION_COMPLETE: 'A clinician has taken over your request.'
};

export const Prompts = {
    rephrase: (): string =>
        'Sorry, I did not quite catch that. Could you say it again?',

    missingSlot: (slot: string): string =>
        SLOT_PROMPTS[slot] ?? `Could you tell me the ${slot.replace(/_/g, ' ')}?`,

    selectCandidate: (candidates: readonly string[]): string => {
        const options = candidates.map((name, index) => `${index + 1}. ${name}`).join(' ');
        return `Did you mean one of these? ${options} Reply with the number or the name.`;
    },

    status: (state: WorkflowState): string => STATUS_PROMPTS[state],

    dispensed: (orderId: string): string =>
        `Your refill has been placed. Order reference: ${orderId}.`,

    escalated: (): string =>
        'A clinician will review your request and follow up with you shortly.'
} as const;
