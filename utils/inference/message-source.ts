/**
 * Infers a human-readable sender label ("Amazon", "SF Fire CU") from SMS text.
 * Each ladder step is a named rule; the first one that yields a label wins.
 *
 * @module utils/inference/message-source
 */

import knownServices from '@/utils/inference/known-services.json';

type SourceRule = {
    name: string;
    resolve: (text: string) => string | null;
};

const STOPWORDS = new Set([
    'your',
    'the',
    'this',
    'that',
    'use',
    'enter',
    'code',
    'is',
    'are',
    'was',
    'verification',
    'verify',
    'security',
    'never',
    'share',
    'anyone',
    'call',
    'with',
    'for',
    'not',
    'did',
    'will',
    'can',
    'may',
    'our',
    'please',
    'do',
    'one',
    'time',
    'otp',
    'pin',
    'password',
    'login',
    'sign',
    'account',
]);

const CREDIT_UNION_PATTERN = /\b(?:[A-Z][A-Za-z0-9]*\s+){1,3}(?:CU|FCU|Credit\s+Union)\b/;

const ORGANIZATION_PATTERNS: readonly RegExp[] = [
    /\b([A-Z]{2,}(?:\s+[A-Z][a-z]+)*(?:\s+(?:CU|FCU|Bank|Inc|Corp|LLC))?)\b/,
    /^([A-Z][A-Za-z0-9]+(?:\s+[A-Z][A-Za-z0-9]+)*):/,
    /\[([A-Za-z0-9\s]+)\]/,
    /from\s+([A-Z][A-Za-z0-9]+(?:\s+[A-Z][A-Za-z0-9]+)*)/i,
];

const toTitleCase = (value: string) =>
    value
        .split(' ')
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');

const isMeaningfulName = (candidate: string) => {
    if (candidate.length < 2 || candidate.length > 30) {
        return false;
    }
    return candidate
        .toLowerCase()
        .split(/\s+/)
        .some((word) => word.length > 2 && !STOPWORDS.has(word));
};

const resolveCreditUnion = (text: string) => text.match(CREDIT_UNION_PATTERN)?.[0].trim() ?? null;

const resolveKnownService = (text: string) => {
    const lowerText = text.toLowerCase();
    const service = knownServices.find((name) => lowerText.includes(name));
    return service ? toTitleCase(service) : null;
};

const resolveOrganization = (text: string) => {
    for (const pattern of ORGANIZATION_PATTERNS) {
        const candidate = text.match(pattern)?.[1]?.trim();
        if (candidate && isMeaningfulName(candidate)) {
            return candidate;
        }
    }
    return null;
};

export const SOURCE_RULES: readonly SourceRule[] = [
    { name: 'credit-union', resolve: resolveCreditUnion },
    { name: 'known-service', resolve: resolveKnownService },
    { name: 'organization', resolve: resolveOrganization },
];

export const inferSource = (text: string | null | undefined): string | null => {
    if (!text) {
        return null;
    }
    for (const rule of SOURCE_RULES) {
        const label = rule.resolve(text);
        if (label) {
            return label;
        }
    }
    return null;
};
