import { isDigitCode, isFiniteNumber, isNullableString, isRecord } from '@/utils/type-guards';

export type CodeRecord = {
    code: string;
    source: string | null;
    timestamp: number;
    isNew: boolean;
};

export interface NewCodeMessage {
    type: 'NEW_CODE';
    code: string;
    source?: string | null;
    messageText?: string | null;
    timestamp?: number;
}

export interface RequestCodeMessage {
    type: 'REQUEST_CODE';
}

export interface GetAllCodesMessage {
    type: 'GET_ALL_CODES';
}

export interface CodeFilledMessage {
    type: 'CODE_FILLED';
    code: string;
}

export interface GetStatusMessage {
    type: 'GET_STATUS';
}

export interface CodeAvailableMessage {
    type: 'CODE_AVAILABLE';
    code: string;
    timestamp: number;
    source: string | null;
}

export type AckResponse = { success: true };

export type LatestCodeResponse =
    | { code: string; timestamp: number; source: string | null }
    | { code: null; waiting: true };

export type AllCodesResponse = { codes: CodeRecord[] };

export type StatusResponse = {
    hasCode: boolean;
    code?: string;
    timestamp?: number;
    source?: string | null;
    pendingTabs: number;
};

export type CodeRuntimeMessage =
    | NewCodeMessage
    | RequestCodeMessage
    | GetAllCodesMessage
    | CodeFilledMessage
    | GetStatusMessage;

const isOptional = <T>(value: unknown, guard: (candidate: unknown) => candidate is T) =>
    value === undefined || guard(value);

export function isNewCodeMessage(value: unknown): value is NewCodeMessage {
    if (!isRecord(value) || value.type !== 'NEW_CODE') {
        return false;
    }
    return (
        isDigitCode(value.code) &&
        isOptional(value.source, isNullableString) &&
        isOptional(value.messageText, isNullableString) &&
        isOptional(value.timestamp, isFiniteNumber)
    );
}

export function isRequestCodeMessage(value: unknown): value is RequestCodeMessage {
    return isRecord(value) && value.type === 'REQUEST_CODE';
}

export function isGetAllCodesMessage(value: unknown): value is GetAllCodesMessage {
    return isRecord(value) && value.type === 'GET_ALL_CODES';
}

export function isCodeFilledMessage(value: unknown): value is CodeFilledMessage {
    return isRecord(value) && value.type === 'CODE_FILLED' && typeof value.code === 'string';
}

export function isGetStatusMessage(value: unknown): value is GetStatusMessage {
    return isRecord(value) && value.type === 'GET_STATUS';
}

export function isCodeAvailableMessage(value: unknown): value is CodeAvailableMessage {
    if (!isRecord(value) || value.type !== 'CODE_AVAILABLE') {
        return false;
    }
    return isDigitCode(value.code) && isFiniteNumber(value.timestamp) && isNullableString(value.source);
}

export function isCodeRecord(value: unknown): value is CodeRecord {
    if (!isRecord(value)) {
        return false;
    }
    return (
        isDigitCode(value.code) &&
        isNullableString(value.source) &&
        isFiniteNumber(value.timestamp) &&
        typeof value.isNew === 'boolean'
    );
}

export function isAllCodesResponse(value: unknown): value is AllCodesResponse {
    return isRecord(value) && Array.isArray(value.codes);
}

export function isLatestCodeResponse(value: unknown): value is LatestCodeResponse {
    if (!isRecord(value)) {
        return false;
    }
    if (value.code === null) {
        return value.waiting === true;
    }
    return isDigitCode(value.code) && isFiniteNumber(value.timestamp) && isNullableString(value.source);
}
