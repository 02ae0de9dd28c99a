import type { Reporter } from './types.js';

/** Reporter that drops every event. */
export const silentReporter: Reporter = Object.freeze({
    report: () => {},
});
