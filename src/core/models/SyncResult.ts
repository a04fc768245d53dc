/**
 * Failure kinds surfaced by the session, the playback provider and the command surface.
 * None of them is fatal; the UI turns each into a notice.
 */
export type SyncErrorKind =
    | 'NotFound'
    | 'ReadFailed'
    | 'InvalidEncoding'
    | 'UnsupportedFormat'
    | 'EmptyFile'
    | 'NotReady'
    | 'AlreadyComplete'
    | 'ConfirmationRequired'
    | 'WriteFailed';

export interface SyncError {
    kind: SyncErrorKind;
    message: string;
    /** Underlying error, e.g. the filesystem error behind a failed write. */
    cause?: unknown;
}

export type SyncResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: SyncError };

export function ok<T>(value: T): SyncResult<T> {
    return { ok: true, value };
}

export function fail<T = never>(kind: SyncErrorKind, message: string, cause?: unknown): SyncResult<T> {
    return cause === undefined
        ? { ok: false, error: { kind, message } }
        : { ok: false, error: { kind, message, cause } };
}
