import {ArchiveEntry} from "../../types/crop";

export interface IArchiveService {
    /**
     * Pack entries into a single compressed archive. Entry names are kept verbatim;
     * when two entries share a name the later one replaces the earlier.
     */
    write(entries: ArchiveEntry[]): Promise<Buffer>;
}
