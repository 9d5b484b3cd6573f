/**
 * Decides whether an input on an arbitrary page is meant for a one-time code.
 * Rules run in order; the first one that matches names the reason.
 *
 * @module utils/field-agent/field-classifier
 */

type FieldRule = {
    name: string;
    matches: (input: HTMLInputElement) => boolean;
};

export const AUTOCOMPLETE_HINTS = ['one-time-code', 'otp'] as const;

export const FIELD_NAME_HINTS = [
    'otp',
    'code',
    'verification',
    'verify',
    'token',
    'pin',
    'mfa',
    '2fa',
    'one-time',
    'onetime',
    'passcode',
    'security-code',
    'auth-code',
    'sms-code',
    'totp',
    'tfa',
] as const;

export const FIELD_CLASS_PATTERN = /otp|code|verify|token|pin|mfa|2fa|digit|passcode/i;

export const CONTEXT_PHRASES = [
    'verification code',
    'enter code',
    'enter the code',
    'security code',
    'one-time',
    'otp',
    '2-step',
    'two-step',
    'sent to your phone',
    'sent a code',
    'text message',
] as const;

const MIN_FILLED_LENGTH = 4;

const attr = (input: HTMLInputElement, name: string) => (input.getAttribute(name) ?? '').toLowerCase();

/** Explicit `type` attribute, or an empty string when the page left it out. */
const declaredType = (input: HTMLInputElement) => attr(input, 'type');

export const readMaxLength = (input: HTMLInputElement): number | null => {
    const parsed = Number.parseInt(input.getAttribute('maxlength') ?? '', 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : null;
};

const hasAutocompleteHint = (input: HTMLInputElement) => {
    const autocomplete = attr(input, 'autocomplete');
    return AUTOCOMPLETE_HINTS.some((hint) => autocomplete.includes(hint));
};

const hasNamingHint = (input: HTMLInputElement) => {
    const text = ['name', 'id', 'placeholder', 'aria-label'].map((name) => attr(input, name)).join(' ');
    return FIELD_NAME_HINTS.some((hint) => text.includes(hint));
};

const hasClassHint = (input: HTMLInputElement) => FIELD_CLASS_PATTERN.test(input.getAttribute('class') ?? '');

const hasNumericShape = (input: HTMLInputElement) => {
    const maxLength = readMaxLength(input);
    if (maxLength === null || maxLength < 4 || maxLength > 8) {
        return false;
    }
    const type = declaredType(input);
    return type === 'tel' || type === 'number' || attr(input, 'inputmode') === 'numeric';
};

const hasVerificationContext = (input: HTMLInputElement) => {
    const type = declaredType(input);
    if (type !== '' && type !== 'text' && type !== 'tel' && type !== 'number') {
        return false;
    }
    const containerText = input.closest('form, div, section')?.textContent?.toLowerCase() ?? '';
    return CONTEXT_PHRASES.some((phrase) => containerText.includes(phrase));
};

export const FIELD_RULES: readonly FieldRule[] = [
    { name: 'autocomplete', matches: hasAutocompleteHint },
    { name: 'naming', matches: hasNamingHint },
    { name: 'class', matches: hasClassHint },
    { name: 'numeric-shape', matches: hasNumericShape },
    { name: 'verification-context', matches: hasVerificationContext },
];

const isEligibleInput = (value: unknown): value is HTMLInputElement => {
    if (!(value instanceof HTMLInputElement)) {
        return false;
    }
    if (declaredType(value) === 'hidden' || value.disabled || value.readOnly) {
        return false;
    }
    return value.value.length < MIN_FILLED_LENGTH;
};

/** Name of the first rule that marks the element as a code field, or null. */
export const classifyField = (value: unknown): string | null => {
    if (!isEligibleInput(value)) {
        return null;
    }
    return FIELD_RULES.find((rule) => rule.matches(value))?.name ?? null;
};

export const isOtpField = (value: unknown): value is HTMLInputElement => classifyField(value) !== null;

export const findOtpFields = (root: ParentNode = document): HTMLInputElement[] =>
    Array.from(root.querySelectorAll('input')).filter(isOtpField);
