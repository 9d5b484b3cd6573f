export type DebouncedTask = {
    /** Cancels any pending run and schedules a fresh one. */
    schedule: () => void;
    cancel: () => void;
    isPending: () => boolean;
};

/**
 * Single-timer debounce: a new trigger replaces the pending one instead of
 * queueing behind it.
 */
export const createDebouncedTask = (run: () => void, delayMs: number): DebouncedTask => {
    let timer: ReturnType<typeof setTimeout> | null = null;

    const cancel = () => {
        if (timer !== null) {
            clearTimeout(timer);
            timer = null;
        }
    };

    const schedule = () => {
        cancel();
        timer = setTimeout(() => {
            timer = null;
            run();
        }, delayMs);
    };

    return {
        schedule,
        cancel,
        isPending: () => timer !== null,
    };
};
