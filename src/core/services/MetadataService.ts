import { parseFile } from 'music-metadata';
import type { IOptions } from 'music-metadata';
import type { AudioInformation } from '../interfaces/AudioInformation';
import { Logger } from '../utils/Logger';

/** The parts of a music-metadata result this service reads. */
export interface ProbedMetadata {
    common: { title?: string; artist?: string; album?: string };
    format: { duration?: number };
}

export type MetadataReader = (path: string, options: IOptions) => Promise<ProbedMetadata>;

export class MetadataService {
    constructor(private readonly readMetadata: MetadataReader = parseFile) { }

    /**
     * Parse metadata from an audio file.
     * Returns partial metadata (what is found); a failed probe only yields the path.
     */
    public async parse(path: string): Promise<AudioInformation> {
        const result: AudioInformation = { sourceId: path };

        try {
            const metadata = await this.readMetadata(path, { duration: true, skipCovers: true });
            const common = metadata.common;

            if (common.title) result.title = common.title;
            if (common.artist) result.artist = common.artist;
            if (common.album) result.album = common.album;
            if (metadata.format.duration !== undefined) {
                result.duration = Math.round(metadata.format.duration * 1000);
            }

            Logger.debug(`[Metadata] Parsed ${path}`, result);
        } catch (error) {
            Logger.warn(`[Metadata] Failed to parse ${path}`, error);
        }

        return result;
    }
}
