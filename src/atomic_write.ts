// src/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function errorCode(e: unknown): string | undefined {
    if (typeof e === "object" && e !== null && "code" in e && typeof e.code === "string") {
        return e.code;
    }
    return undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

/**
 * Write through a sibling temp file and rename, so readers see either the old
 * file or the complete new one. Non-fatal fsync failures in BEST_EFFORT mode
 * are reported through `warnings`.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    const { filePath, content, mode, fsyncMode, warnings } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    try {
        fs.mkdirSync(dir, { recursive: true, mode: 0o755 });

        // tmp always 0600 initially
        fs.writeFileSync(tmp, content, { mode: 0o600 });

        try {
            const fd = fs.openSync(tmp, "r+");
            try {
                fs.fdatasyncSync(fd);
            } finally {
                fs.closeSync(fd);
            }
        } catch (e) {
            const code = errorCode(e);
            if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
            warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${tmp}`);
        }

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        try {
            const dirFd = fs.openSync(dir, "r");
            try {
                fs.fsyncSync(dirFd);
            } finally {
                fs.closeSync(dirFd);
            }
        } catch (e) {
            const code = errorCode(e);
            if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
            warnings.push(`FSYNC_WARN(${code || "UNKNOWN"}) on ${dir}`);
        }
    } catch (e) {
        if (fs.existsSync(tmp)) {
            try {
                fs.unlinkSync(tmp);
            } catch (cleanupErr) {
                warnings.push(`TMP_CLEANUP_FAILED(${errorCode(cleanupErr) || "UNKNOWN"}) on ${tmp}`);
            }
        }
        throw e;
    }
}
