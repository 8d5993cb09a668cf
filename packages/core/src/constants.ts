/**
 * Shared runtime defaults.
 *
 * Keep these values in a single module so the config schema, the runtime and
 * tests stay aligned when defaults change.
 */

export const DEFAULT_COMMAND_TIMEOUT_SEC = 120;
export const DEFAULT_MAX_TOKENS = 2048;

// Grace period between SIGTERM and SIGKILL for a timed out command.
export const FORCE_KILL_DELAY_MS = 1000;

export const REPORT_STDOUT_LIMIT = 500;
export const REPORT_STDERR_LIMIT = 300;
export const TRUNCATION_MARKER = '...(truncated)';

export const TELEGRAM_API_ROOT = 'https://api.telegram.org';
export const TELEGRAM_POLL_TIMEOUT_SEC = 25;
export const TELEGRAM_RETRY_DELAY_MS = 3000;
