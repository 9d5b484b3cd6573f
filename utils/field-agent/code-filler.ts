import { readMaxLength } from '@/utils/field-agent/field-classifier';

const setValue = (input: HTMLInputElement, value: string) => {
    input.value = value;
    input.dispatchEvent(new Event('input', { bubbles: true }));
    input.dispatchEvent(new Event('change', { bubbles: true }));
};

/**
 * Writes one digit into each single-character input of the group around
 * `firstField`. Inputs beyond the code length stay untouched.
 */
export const fillSplitCode = (firstField: HTMLInputElement, code: string): number => {
    const group = firstField.closest('form, div');
    if (!group) {
        return 0;
    }
    const inputs = Array.from(group.querySelectorAll<HTMLInputElement>('input[maxlength="1"]'));
    const targets = inputs.slice(0, code.length);
    targets.forEach((input, index) => {
        setValue(input, code[index]);
    });
    return targets.length;
};

/**
 * Fills a code into the field, or into its one-digit siblings when the
 * field holds a single character. Returns false when neither shape fits.
 */
export const fillCode = (field: HTMLInputElement, code: string): boolean => {
    if (!code) {
        return false;
    }
    field.focus();

    const maxLength = readMaxLength(field);
    if (maxLength === null || maxLength >= code.length) {
        setValue(field, code);
        field.dispatchEvent(new KeyboardEvent('keyup', { bubbles: true }));
        return true;
    }
    if (maxLength === 1) {
        return fillSplitCode(field, code) > 0;
    }
    return false;
};
