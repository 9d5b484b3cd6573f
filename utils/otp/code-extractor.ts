import {
    CODE_EXTRACTION_RULES,
    EXCLUSION_RULES,
    MAX_CODE_LENGTH,
    MAX_SCANNABLE_TEXT_LENGTH,
    MIN_CODE_LENGTH,
    REQUIRED_KEYWORDS,
    STRONG_PHRASES,
} from '@/utils/otp/code-patterns';

export type CodeMatch = {
    code: string;
    rule: string;
};

export const hasRequiredKeyword = (text: string) => {
    const lowerText = text.toLowerCase();
    return REQUIRED_KEYWORDS.some((keyword) => lowerText.includes(keyword));
};

export const hasStrongPhrase = (text: string) => {
    const lowerText = text.toLowerCase();
    return STRONG_PHRASES.some((phrase) => lowerText.includes(phrase));
};

/**
 * Name of the first exclusion pattern present in the text, or null. A hit
 * only disqualifies the text when no strong phrase overrides it.
 */
export const findExclusion = (text: string): string | null =>
    EXCLUSION_RULES.find((rule) => rule.pattern.test(text))?.name ?? null;

const isValidCodeLength = (code: string) => code.length >= MIN_CODE_LENGTH && code.length <= MAX_CODE_LENGTH;

export const matchCode = (text: string | null | undefined): CodeMatch | null => {
    if (!text || text.length > MAX_SCANNABLE_TEXT_LENGTH) {
        return null;
    }
    if (!hasRequiredKeyword(text)) {
        return null;
    }
    if (findExclusion(text) !== null && !hasStrongPhrase(text)) {
        return null;
    }

    for (const rule of CODE_EXTRACTION_RULES) {
        const digits = text.match(rule.pattern)?.[1];
        if (digits && isValidCodeLength(digits)) {
            return { code: digits, rule: rule.name };
        }
    }
    return null;
};

/**
 * Extracts a 4–8 digit one-time code from message text, or null when the
 * text has no 2FA context or no code-shaped match.
 */
export const extractCode = (text: string | null | undefined): string | null => matchCode(text)?.code ?? null;
