import type { SyncError, SyncErrorKind } from '../core/models/SyncResult';

export type NoticeLevel = 'info' | 'success' | 'warn' | 'error';

export interface Notice {
    level: NoticeLevel;
    title: string;
    message: string;
}

const ERROR_NOTICES: Record<SyncErrorKind, { level: NoticeLevel; title: string }> = {
    NotFound: { level: 'error', title: 'File not found' },
    ReadFailed: { level: 'error', title: 'Load failed' },
    InvalidEncoding: { level: 'error', title: 'Load failed' },
    UnsupportedFormat: { level: 'error', title: 'Unsupported format' },
    EmptyFile: { level: 'error', title: 'Empty lyrics' },
    NotReady: { level: 'warn', title: 'Not ready' },
    AlreadyComplete: { level: 'info', title: 'Done' },
    ConfirmationRequired: { level: 'warn', title: 'No timestamps' },
    WriteFailed: { level: 'error', title: 'Save failed' }
};

export function noticeForError(error: SyncError): Notice {
    const { level, title } = ERROR_NOTICES[error.kind];
    return { level, title, message: error.message };
}

export const NOTICE_COLORS: Record<NoticeLevel, string> = {
    info: 'cyan',
    success: 'green',
    warn: 'yellow',
    error: 'red'
};
