const ROW_CONTACT_SELECTORS = [
    '[data-e2e-contact-name]',
    '[data-caller-id]',
    '.contact-name',
    '.sender-name',
    '.participant-name',
    'h3',
    '[role="heading"]',
] as const;

const CONVERSATION_HEADER_SELECTORS = [
    'gv-conversation-header [data-e2e-contact-name]',
    '.conversation-header .contact-name',
    'gv-contact-pill',
    '[data-e2e-conversation-title]',
    'h1',
] as const;

const looksLikeClock = (text: string) => /^\d{1,2}:\d{2}/.test(text);

const isNamedContact = (name: string) => name.length > 1 && !looksLikeClock(name) && !/^[\d\s]+$/.test(name);

const isLooseContactText = (text: string) =>
    text.length >= 2 &&
    text.length <= 30 &&
    !looksLikeClock(text) &&
    !/^\(\d{3}\)/.test(text) &&
    !/^\d{3}-\d{3}/.test(text) &&
    !/verification|code|otp/i.test(text);

/**
 * Sender label of a message-list row: a dedicated contact element first,
 * then the first short text node that is not a time, phone number or preview.
 */
export const resolveContactLabel = (row: Element | null): string | null => {
    if (!row) {
        return null;
    }
    for (const selector of ROW_CONTACT_SELECTORS) {
        const name = row.querySelector(selector)?.textContent?.trim();
        if (name && isNamedContact(name)) {
            return name;
        }
    }
    for (const node of row.querySelectorAll('span, div')) {
        const text = node.textContent?.trim();
        if (text && isLooseContactText(text)) {
            return text;
        }
    }
    return null;
};

export const resolveConversationContact = (root: ParentNode): string | null => {
    for (const selector of CONVERSATION_HEADER_SELECTORS) {
        const name = root.querySelector(selector)?.textContent?.trim();
        if (name && name.length > 1 && name.length < 50) {
            return name;
        }
    }
    return null;
};
