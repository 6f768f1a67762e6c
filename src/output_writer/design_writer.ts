// src/output_writer/design_writer.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";

import { createLogger } from "../logger";
import type { DesignRequest, DesignResult } from "../design_types";
import { atomicWriteFileSync, atomicWriteJsonSync, FsyncMode } from "./atomic_write";
import { stableStringify } from "./stable_stringify";

const log = createLogger("writer");

export type VerifiedDesignResult = Extract<DesignResult, { status: "VERIFIED" }>;

export interface ManifestModule {
    name: string;
    dependencies: string[];
    attempts: number;
    ports: Array<{ name: string; direction: string; width: number }>;
}

export interface DesignManifestV1 {
    schema: "rtlforge.design.v1";
    run_id: string;
    prompt: string;
    top: string;
    order: string[];
    hierarchy: string;
    created_at: string;
    modules: ManifestModule[];
    /** relative path -> sha256 of content */
    files: Record<string, string>;
    content_hash: string;
}

export interface SavedDesign {
    dir: string;
    files: string[];
    warnings: string[];
}

export interface DesignWriterOptions {
    fsyncMode?: FsyncMode;
}

const FILE_MODE = 0o644;

/** Lowercase words joined by '_', at most 40 chars; 'design' when nothing is left. */
export function designSlug(prompt: string): string {
    const slug = prompt
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, "_")
        .replace(/^_+|_+$/g, "")
        .slice(0, 40)
        .replace(/_+$/, "");
    return slug.length > 0 ? slug : "design";
}

function pad(n: number): string {
    return String(n).padStart(2, "0");
}

/** yyyymmdd_hhmmss in UTC */
export function timestampName(date: Date): string {
    return (
        `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
        `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
    );
}

function sha256(text: string): string {
    return "sha256:" + crypto.createHash("sha256").update(Buffer.from(text, "utf8")).digest("hex");
}

export class DesignWriter {
    private readonly fsyncMode: FsyncMode;

    constructor(private readonly outputDir: string, options: DesignWriterOptions = {}) {
        this.fsyncMode = options.fsyncMode ?? "BEST_EFFORT";
    }

    save(result: VerifiedDesignResult, request: DesignRequest, now: Date = new Date()): SavedDesign {
        const dir = this.allocateDir(`${timestampName(now)}_${designSlug(request.prompt)}`);
        const warnings: string[] = [];
        const { design } = result;

        const contents = new Map<string, string>();
        contents.set("design.v", design.source);
        for (const m of design.modules) {
            contents.set(`modules/${m.name}.v`, `${m.implementation.trim()}\n`);
            contents.set(`tb/${m.name}_tb.v`, `${m.harness.trim()}\n`);
        }

        const files: Record<string, string> = {};
        for (const [rel, text] of contents) {
            atomicWriteFileSync({
                filePath: path.join(dir, rel),
                content: text,
                mode: FILE_MODE,
                fsyncMode: this.fsyncMode,
                warnings,
            });
            files[rel] = sha256(text);
        }

        const attemptsByModule = new Map(result.modules.map(m => [m.name, m.attempts.length]));
        const manifest: DesignManifestV1 = {
            schema: "rtlforge.design.v1",
            run_id: result.runId,
            prompt: request.prompt,
            top: design.top,
            order: design.modules.map(m => m.name),
            hierarchy: design.hierarchy,
            created_at: now.toISOString(),
            modules: design.modules.map(m => ({
                name: m.name,
                dependencies: [...m.dependencies],
                attempts: attemptsByModule.get(m.name) ?? 0,
                ports: m.ports.map(p => ({ name: p.name, direction: p.direction, width: p.width })),
            })),
            files,
            content_hash: sha256(stableStringify(files)),
        };
        atomicWriteJsonSync({
            filePath: path.join(dir, "manifest.json"),
            data: manifest,
            mode: FILE_MODE,
            fsyncMode: this.fsyncMode,
            warnings,
        });

        for (const w of warnings) log.warn(w, { dir });
        log.info(`Design saved`, { dir, files: contents.size + 1 });
        return { dir, files: [...contents.keys(), "manifest.json"], warnings };
    }

    /** Fresh directory; a same-second collision gets a numeric suffix. */
    private allocateDir(base: string): string {
        fs.mkdirSync(this.outputDir, { recursive: true, mode: 0o755 });
        for (let n = 1; ; n++) {
            const candidate = path.join(this.outputDir, n === 1 ? base : `${base}_${n}`);
            try {
                fs.mkdirSync(candidate, { mode: 0o755 });
                return candidate;
            } catch (e) {
                if (e instanceof Error && Reflect.get(e, "code") === "EEXIST") continue;
                throw e;
            }
        }
    }
}
