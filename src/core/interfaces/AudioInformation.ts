/**
 * Metadata of the audio track being synced.
 */
export interface AudioInformation {
    /** Track title */
    title?: string;

    /** Performing artist */
    artist?: string;

    /** Album name */
    album?: string;

    /** Track duration in milliseconds, when the container reports one. */
    duration?: number;

    /** Path of the file on disk. */
    sourceId: string;
}
