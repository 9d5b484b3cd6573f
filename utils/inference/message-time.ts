/**
 * Resolves the partial time labels an inbox renders ("3:55 PM", "Thu",
 * "Jan 15") into epoch milliseconds. Rules run in order; first hit wins.
 *
 * @module utils/inference/message-time
 */

type TimeTextRule = {
    name: string;
    resolve: (text: string, now: Date) => number | null;
};

const WEEKDAYS = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];
const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

export const TIME_ELEMENT_SELECTORS = [
    '[data-e2e-timestamp]',
    'time',
    '.timestamp',
    '.message-time',
    '.time',
    'gv-relative-time',
] as const;

const resolveClockTime = (text: string, now: Date) => {
    const match = text.match(/^(\d{1,2}):(\d{2})\s*(AM|PM)?$/i);
    if (!match) {
        return null;
    }
    let hours = Number.parseInt(match[1], 10);
    const minutes = Number.parseInt(match[2], 10);
    const meridiem = match[3]?.toUpperCase();
    if (meridiem === 'PM' && hours !== 12) {
        hours += 12;
    }
    if (meridiem === 'AM' && hours === 12) {
        hours = 0;
    }

    const messageDate = new Date(now);
    messageDate.setHours(hours, minutes, 0, 0);
    // A clock time later than now belongs to yesterday.
    if (messageDate > now) {
        messageDate.setDate(messageDate.getDate() - 1);
    }
    return messageDate.getTime();
};

const resolveWeekday = (text: string, now: Date) => {
    const match = text.match(/^(Mon|Tue|Wed|Thu|Fri|Sat|Sun)/i);
    if (!match) {
        return null;
    }
    const targetDay = WEEKDAYS.indexOf(match[1].toLowerCase());
    let daysAgo = now.getDay() - targetDay;
    if (daysAgo <= 0) {
        daysAgo += 7;
    }

    const messageDate = new Date(now);
    messageDate.setDate(messageDate.getDate() - daysAgo);
    messageDate.setHours(12, 0, 0, 0);
    return messageDate.getTime();
};

const resolveMonthDay = (text: string, now: Date) => {
    const match = text.match(/^(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+(\d{1,2})$/i);
    if (!match) {
        return null;
    }
    const month = MONTHS.indexOf(match[1].toLowerCase());
    const day = Number.parseInt(match[2], 10);

    const messageDate = new Date(now.getFullYear(), month, day, 12, 0, 0, 0);
    if (messageDate > now) {
        messageDate.setFullYear(messageDate.getFullYear() - 1);
    }
    return messageDate.getTime();
};

export const TIME_TEXT_RULES: readonly TimeTextRule[] = [
    { name: 'clock-time', resolve: resolveClockTime },
    { name: 'weekday', resolve: resolveWeekday },
    { name: 'month-day', resolve: resolveMonthDay },
];

export const parseMessageTime = (timeText: string | null | undefined, nowMs: number = Date.now()): number => {
    const text = timeText?.trim();
    if (!text) {
        return nowMs;
    }
    const now = new Date(nowMs);
    for (const rule of TIME_TEXT_RULES) {
        const resolved = rule.resolve(text, now);
        if (resolved !== null) {
            return resolved;
        }
    }
    return nowMs;
};

const resolveFromTimeElement = (element: Element, nowMs: number): number | null => {
    for (const selector of TIME_ELEMENT_SELECTORS) {
        const timeEl = element.querySelector(selector);
        if (!timeEl) {
            continue;
        }
        const datetime = timeEl.getAttribute('datetime');
        if (datetime) {
            const parsed = Date.parse(datetime);
            if (!Number.isNaN(parsed)) {
                return parsed;
            }
        }
        const timeText = timeEl.textContent?.trim();
        if (timeText) {
            return parseMessageTime(timeText, nowMs);
        }
    }
    return null;
};

/**
 * Message time for a row or bubble: a machine-readable `datetime` first,
 * then the rendered label, then any clock time in the element text, then now.
 */
export const resolveMessageTimestamp = (element: Element | null, nowMs: number = Date.now()): number => {
    if (!element) {
        return nowMs;
    }
    const fromTimeElement = resolveFromTimeElement(element, nowMs);
    if (fromTimeElement !== null) {
        return fromTimeElement;
    }
    const inlineClock = (element.textContent ?? '').match(/\b(\d{1,2}:\d{2}\s*(?:AM|PM)?)\b/i);
    if (inlineClock) {
        return parseMessageTime(inlineClock[1], nowMs);
    }
    return nowMs;
};
