/**
 * Sidecar metadata handling for local storage
 *
 * The filesystem has no place for a content type, so each file written with
 * one gets a companion .meta.json file next to it.
 * For example: report.pdf has report.pdf.meta.json
 */

import { readFile, unlink, writeFile } from "node:fs/promises";
import { z } from "zod";
import { getErrnoCode } from "../../core/errors.js";

/**
 * Metadata stored in sidecar files
 */
const sidecarSchema = z.object({
  contentType: z.string().optional(),
  contentMd5: z.string().optional(),
  updatedAt: z.string(), // ISO 8601
});

export type SidecarMetadata = z.infer<typeof sidecarSchema>;

const SIDECAR_SUFFIX = ".meta.json";

/**
 * Get the metadata file path for a given file path
 */
export function getMetadataPath(filePath: string): string {
  return `${filePath}${SIDECAR_SUFFIX}`;
}

/**
 * Read metadata from sidecar file
 *
 * @param filePath - Path to the main file (not the metadata file)
 * @returns the sidecar, or null if it doesn't exist or is unreadable JSON
 */
export async function readMetadata(
  filePath: string,
): Promise<SidecarMetadata | null> {
  const metaPath = getMetadataPath(filePath);

  let content: string;
  try {
    content = await readFile(metaPath, "utf-8");
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    // A torn sidecar only loses the content type
    return null;
  }
  const result = sidecarSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Write metadata to sidecar file
 *
 * @param filePath - Path to the main file (not the metadata file)
 */
export async function writeMetadata(
  filePath: string,
  sidecar: SidecarMetadata,
  mode?: number,
): Promise<void> {
  await writeFile(
    getMetadataPath(filePath),
    JSON.stringify(sidecar, null, 2),
    { encoding: "utf-8", mode },
  );
}

/**
 * Delete metadata sidecar file
 *
 * @param filePath - Path to the main file (not the metadata file)
 */
export async function deleteMetadata(filePath: string): Promise<void> {
  try {
    await unlink(getMetadataPath(filePath));
  } catch (error) {
    // Ignore if file doesn't exist
    if (getErrnoCode(error) !== "ENOENT") {
      throw error;
    }
  }
}

/**
 * Check if a path is a metadata sidecar file
 */
export function isMetadataFile(path: string): boolean {
  return path.endsWith(SIDECAR_SUFFIX);
}
