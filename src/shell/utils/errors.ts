// CHANGE: Error message extraction for values caught at the shell boundary
// PURITY: CORE (helper used by SHELL)
// INVARIANT: Never throws; always returns a string
// COMPLEXITY: O(1)

/**
 * Message of a caught value.
 *
 * @param error - Anything a `catch` may receive
 * @returns Error message, or the value as a string
 * @pure true
 */
export function errorMessage(error: {} | null | undefined): string {
	return error instanceof Error ? error.message : String(error);
}
