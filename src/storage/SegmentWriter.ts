import { mkdir, open, stat, unlink, type FileHandle } from "fs/promises";
import { dirname } from "path";
import { ignoreFileNotFound } from "@/utils/common";

/**
 * Sequential writer for one segment's temp file. Each worker owns exactly one,
 * so no file handle is ever shared between concurrent writers.
 */
export class SegmentWriter {
    private fileHandle: FileHandle | null = null;
    private position = 0;

    /**
     * Create (or truncate) the temp file
     */
    async open(filePath: string): Promise<void> {
        await mkdir(dirname(filePath), { recursive: true });
        this.fileHandle = await open(filePath, "w");
        this.position = 0;
    }

    /**
     * Append a block at the current end of the file
     */
    async write(data: Buffer): Promise<void> {
        if (!this.fileHandle) throw new Error("File not open");

        let offset = 0;
        while (offset < data.length) {
            const { bytesWritten } = await this.fileHandle.write(
                data,
                offset,
                data.length - offset,
                this.position
            );
            offset += bytesWritten;
            this.position += bytesWritten;
        }
    }

    async close(): Promise<void> {
        if (this.fileHandle) {
            const handle = this.fileHandle;
            this.fileHandle = null;
            await handle.close();
        }
    }

    /**
     * Check if file exists and get size
     */
    static async exists(filePath: string): Promise<{ exists: boolean; size: number }> {
        return stat(filePath)
            .then(stats => ({ exists: true, size: stats.size }))
            .catch((error: unknown) => {
                if (ignoreFileNotFound(error)) return { exists: false, size: 0 };
                throw error;
            });
    }

    /**
     * Delete file; a missing file is not an error
     */
    static async delete(filePath: string): Promise<void> {
        await unlink(filePath).catch((error: unknown) => {
            if (ignoreFileNotFound(error)) return;
            throw error;
        });
    }
}
