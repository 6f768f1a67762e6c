// src/output_writer/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

export type FsyncMode = "BEST_EFFORT" | "REQUIRED";

function errnoOf(e: unknown): string | undefined {
    const code: unknown = e instanceof Error ? Reflect.get(e, "code") : undefined;
    return typeof code === "string" ? code : undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === "ENOSPC" || code === "EIO";
}

function fsyncPath(p: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(p, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoOf(e);
        if (fsyncMode === "REQUIRED" || isFatalBestEffort(code)) throw e;
        // EPERM / EINVAL / EROFS and friends: directory fsync is not supported everywhere
        warnings.push(`FSYNC_WARN(${code ?? "UNKNOWN"}) on ${p}`);
    }
}

/**
 * tmp file (0600) -> fsync -> rename -> chmod -> fsync dir.
 * Readers see the old file or the new one, never a partial write.
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
        fs.writeFileSync(tmp, content, { mode: 0o600 });
        fsyncPath(tmp, "r+", fsyncMode, warnings);

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);

        fsyncPath(dir, "r", fsyncMode, warnings);
    } catch (e) {
        try {
            fs.rmSync(tmp, { force: true });
        } catch (cleanupErr) {
            warnings.push(`TMP_CLEANUP_FAILED(${errnoOf(cleanupErr) ?? "UNKNOWN"}) on ${tmp}`);
        }
        throw e;
    }
}

export function atomicWriteJsonSync(params: {
    filePath: string;
    data: unknown;
    mode: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    atomicWriteFileSync({
        filePath: params.filePath,
        content: `${JSON.stringify(params.data, null, 2)}\n`,
        mode: params.mode,
        fsyncMode: params.fsyncMode,
        warnings: params.warnings,
    });
}
