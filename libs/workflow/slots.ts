/**
 * Slot value rules for refill entities.
 * A value that fails its rule is treated as if it had not been given.
 */

const DOSE_PATTERN = /^\d+(\.\d+)?\s*(mg|mcg|g|mL)$/;
const PATIENT_ID_PATTERN = /^\d{6,8}$/;
const INTEGER_PATTERN = /^\d+$/;

/** Entity carrying a 1-based pick from pending drug candidates. Never stored. */
export const SELECTION_ENTITY = 'selection';

const SLOT_RULES: Readonly<Record<string, (value: string) => boolean>> = {
    drug: value => value.length >= 2,
    qty: value => {
        if (!INTEGER_PATTERN.test(value)) return false;
        const qty = Number(value);
        return qty >= 1 && qty <= 365;
    },
    dose: value => DOSE_PATTERN.test(value),
    patient_id: value => PATIENT_ID_PATTERN.test(value)
};

export function isValidSlotValue(slot: string, value: string | undefined): value is string {
    if (value === undefined) return false;
    const trimmed = value.trim();
    if (trimmed.length === 0) return false;
    const rule = SLOT_RULES[slot];
    return rule ? rule(trimmed) : true;
}

/**
 * Trims values and drops empty ones. The selection entity is returned
 * separately so it is never persisted as a slot.
 */
export function normalizeEntities(raw: Readonly<Record<string, string>>): {
    slots: Record<string, string>;
    selection: string | undefined;
} {
    const slots: Record<string, string> = {};
    let selection: string | undefined;
    for (const [key, value] of Object.entries(raw)) {
        const trimmed = value.trim();
        if (trimmed.length === 0) continue;
        if (key === SELECTION_ENTITY) {
            selection = trimmed;
        } else {
            slots[key] = trimmed;
        }
    }
    return { slots, selection };
}
