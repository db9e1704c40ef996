/**
 * True when a Node fs error carries the given errno code (e.g. 'ENOENT').
 */
export function hasErrorCode(error: unknown, code: string): boolean {
    return error instanceof Error && 'code' in error && error.code === code;
}
