import JSZip from "jszip";
import {injectable} from "tsyringe";
import {IArchiveService} from "../IArchiveService";
import {ArchiveEntry} from "../../../types/crop";
import {getLogger} from "../../../logger";
import {formatFileSize} from "../../../utils/media.util";

@injectable()
export class ZipArchiveServiceImpl implements IArchiveService {
    private readonly logger = getLogger(ZipArchiveServiceImpl.name);

    async write(entries: ArchiveEntry[]): Promise<Buffer> {
        const zip = new JSZip();

        for (const entry of entries) {
            if (zip.file(entry.name)) {
                this.logger.warn(`Duplicate archive entry ${entry.name}, keeping the latest`);
            }
            // createFolders off: names go in exactly as given
            zip.file(entry.name, entry.data, {binary: true, createFolders: false});
        }

        const archive = await zip.generateAsync({
            type: "nodebuffer",
            compression: "DEFLATE",
            compressionOptions: {level: 6},
        });

        this.logger.info(`Archive written: ${entries.length} entries, ${formatFileSize(archive.length)}`);
        return archive;
    }
}
