import timers from "timers/promises";

/**
 * A utility function to wait for a specified amount of time.
 * Only the awaiting task is suspended; other pending work keeps running.
 * @param ms - The number of milliseconds to wait.
 * @returns A promise that resolves after the specified time.
 */
const wait = async (ms: number): Promise<void> => {
    await timers.setTimeout(ms);
};

export { wait };
