/**
 * Pattern Library
 *
 * Keyword gate, ordered extraction rules and false-positive exclusions for
 * one-time codes in SMS text.
 *
 * @module utils/otp/code-patterns
 */

export type CodeExtractionRule = {
    name: string;
    /** First capture group holds the digits. */
    pattern: RegExp;
};

export type ExclusionRule = {
    name: string;
    pattern: RegExp;
};

export const MIN_CODE_LENGTH = 4;
export const MAX_CODE_LENGTH = 8;
export const MAX_SCANNABLE_TEXT_LENGTH = 500;

export const REQUIRED_KEYWORDS: readonly string[] = [
    'verification',
    'verify',
    'code',
    'otp',
    'one-time',
    'one time',
    'security code',
    'confirm',
    'login',
    'sign in',
    'authenticate',
    '2fa',
    'two-factor',
    'mfa',
    'passcode',
];

export const STRONG_PHRASES: readonly string[] = ['verification code', 'your code'];

export const CODE_EXTRACTION_RULES: readonly CodeExtractionRule[] = [
    { name: 'keyword-then-digits', pattern: /(?:code|verification|verify|otp|pin)[:\s]+(\d{4,8})\b/i },
    { name: 'digits-is-your-code', pattern: /\b(\d{4,8})\s+is\s+your\s+(?:code|verification|otp|pin)/i },
    { name: 'enter-digits', pattern: /(?:enter|use|input)[:\s]+(\d{4,8})\b/i },
    { name: 'google-prefix', pattern: /\bG-(\d{4,8})\b/i },
    { name: 'your-code-is', pattern: /your\s+(?:verification\s+)?code\s+is\s+(\d{4,8})\b/i },
];

export const EXCLUSION_RULES: readonly ExclusionRule[] = [
    { name: 'phone-parenthesized', pattern: /\(\d{3}\)\s*\d{3}-\d{4}/ },
    { name: 'phone-dashed', pattern: /\d{3}-\d{3}-\d{4}/ },
    { name: 'phone-dotted', pattern: /\d{3}\.\d{3}\.\d{4}/ },
    { name: 'zip-plus-four', pattern: /\b\d{5}-\d{4}\b/ },
    { name: 'currency', pattern: /\$[\d,]+\.\d{2}/ },
    { name: 'year', pattern: /\b(?:19|20)\d{2}\b/ },
];
