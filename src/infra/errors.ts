/**
 * Error message helpers shared by the CLI and logging.
 */

/**
 * Extract a human-readable message from an unknown thrown value.
 * An Error's `cause` chain is appended, e.g. `send failed: host unreachable`.
 */
export function getErrorMessage(error: unknown): string {
    if (!(error instanceof Error)) return String(error);
    if (error.cause === undefined) return error.message;
    return `${error.message}: ${getErrorMessage(error.cause)}`;
}
