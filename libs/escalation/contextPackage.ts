import type { WorkflowState } from '../workflow/states.js';
import { EVALUATOR_NAMES, type VerdictMap, type WorkflowSession } from '../workflow/types.js';
import type { ContextPackage, MedicationEntry } from './types.js';

export function buildContextPackage(
    session: WorkflowSession,
    verdicts: VerdictMap,
    escalatedFrom: WorkflowState
): ContextPackage {
    const slot = (name: string): string | null => session.collectedEntities[name] ?? null;

    const medication = { drug: slot('drug'), dose: slot('dose'), qty: slot('qty'), frequency: slot('frequency') };
    const hasMedication = Object.values(medication).some(value => value !== null);

    // The requested drug first, then the rest of the patient's active list.
    const requested = medication.drug?.toLowerCase();
    const onRecord: MedicationEntry[] = session.activeMedications
        .filter(drug => drug.toLowerCase() !== requested)
        .map(drug => ({ drug, dose: null, qty: null, frequency: null }));

    const verdictSummary: ContextPackage['verdictSummary'][number][] = [];
    for (const evaluator of EVALUATOR_NAMES) {
        const verdict = verdicts[evaluator];
        if (verdict === undefined) continue;
        verdictSummary.push({ evaluator, status: verdict.status, reasonCode: verdict.reasonCode ?? null });
    }

    return {
        patientSummary: {
            patientRef: session.patientRef,
            identityConfirmed: session.identityConfirmed
        },
        medicationList: hasMedication ? [medication, ...onRecord] : onRecord,
        conversationExcerpt: [...session.transcript],
        verdictSummary,
        escalatedFrom
    };
}
