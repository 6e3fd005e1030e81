/**
 * Artifact Storage
 * Per-entity directories for downloaded files and text artifacts.
 * Directories are keyed by entity id, never by name.
 */

import fs from "fs/promises";
import type { Dirent } from "fs";
import path from "path";
import { createHash } from "crypto";
import { NotFoundError, ValidationError } from "../core/errors.js";

export interface ArtifactInfo {
  filename: string;
  sizeBytes: number;
}

/**
 * Directory holding an entity's artifacts
 */
export function entityDir(dataDir: string, entityId: number): string {
  return path.join(dataDir, "entities", String(entityId));
}

/**
 * Directory holding an entity's vector index
 */
export function indexDir(dataDir: string, entityId: number): string {
  return path.join(dataDir, "indexes", String(entityId));
}

export async function ensureEntityDir(dataDir: string, entityId: number): Promise<string> {
  const dir = entityDir(dataDir, entityId);
  await fs.mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Remove every artifact of an entity (before a fresh research run)
 */
export async function clearEntityDir(dataDir: string, entityId: number): Promise<void> {
  await fs.rm(entityDir(dataDir, entityId), { recursive: true, force: true });
}

function slugify(text: string): string {
  return text
    .toLowerCase()
    .normalize("NFKD")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60)
    .replace(/-+$/g, "");
}

/**
 * Stable artifact file name for a source: title slug plus a short URL hash
 */
export function artifactFileName(title: string, url: string, extension: string): string {
  const slug = slugify(title) || "source";
  const hash = createHash("sha1").update(url).digest("hex").slice(0, 8);
  return `${slug}-${hash}.${extension.replace(/^\./, "")}`;
}

/**
 * Swap a file name's extension, e.g. for the text companion of an HTML page
 */
export function withExtension(filename: string, extension: string): string {
  const parsed = path.parse(filename);
  return `${parsed.name}.${extension.replace(/^\./, "")}`;
}

/**
 * Check that a file name addresses a single entry inside the entity directory
 */
export function assertSafeFilename(filename: string): void {
  if (
    filename.length === 0 ||
    filename === "." ||
    filename === ".." ||
    filename.includes("/") ||
    filename.includes("\\") ||
    filename.includes("\0")
  ) {
    throw new ValidationError(`invalid file name "${filename}"`, { field: "filename" });
  }
}

/**
 * Resolve (entityId, filename) to a path under the entity directory.
 * Rejects traversal and missing files.
 */
export async function resolveArtifactPath(
  dataDir: string,
  entityId: number,
  filename: string
): Promise<string> {
  assertSafeFilename(filename);

  const dir = path.resolve(entityDir(dataDir, entityId));
  const target = path.resolve(dir, filename);
  if (path.dirname(target) !== dir) {
    throw new ValidationError(`invalid file name "${filename}"`, { field: "filename" });
  }

  const stat = await fs.stat(target).catch((error: unknown) => {
    if (isMissing(error)) return null;
    throw error;
  });
  if (!stat || !stat.isFile()) {
    throw new NotFoundError(`artifact ${filename}`, { entityId });
  }

  return target;
}

/**
 * List the files of an entity, sorted by name. A missing directory is empty.
 */
export async function listArtifacts(dataDir: string, entityId: number): Promise<ArtifactInfo[]> {
  const dir = entityDir(dataDir, entityId);

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }

  const files = entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  const infos: ArtifactInfo[] = [];
  for (const filename of files) {
    const stat = await fs.stat(path.join(dir, filename));
    infos.push({ filename, sizeBytes: stat.size });
  }
  return infos;
}

/**
 * Whether an fs error means the path does not exist
 */
export function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
