// src/output_writer/index.ts

export { DesignWriter, designSlug, timestampName } from "./design_writer";
export type { DesignManifestV1, ManifestModule, SavedDesign, DesignWriterOptions, VerifiedDesignResult } from "./design_writer";
export { atomicWriteFileSync, atomicWriteJsonSync } from "./atomic_write";
export type { FsyncMode } from "./atomic_write";
export { stableStringify } from "./stable_stringify";
