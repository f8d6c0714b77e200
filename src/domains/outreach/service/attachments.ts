/**
 * Attachment Resolver
 *
 * Turns the tool's `attachment_path` / `attachment_paths` pair into one
 * ordered, deduplicated AttachmentSet. This set is the only authoritative
 * attachment list; file names mentioned in prompt text are not consulted.
 */

import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import path from 'path';
import { AttachmentError } from '../errors.js';
import type { AttachmentHandle, AttachmentSet } from '../types.js';

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.txt': 'text/plain',
  '.csv': 'text/csv',
  '.html': 'text/html',
  '.doc': 'application/msword',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.xls': 'application/vnd.ms-excel',
  '.xlsx': 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  '.zip': 'application/zip',
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

export interface ResolveOptions {
  /** Directory relative paths are resolved against (default: cwd) */
  baseDir?: string;
}

export interface MergedPath {
  /** Normalized absolute path */
  absolute: string;
  /** Path as the caller gave it */
  original: string;
}

/**
 * Merge order: single path first, then list order. Duplicates by
 * normalized absolute path keep their first position.
 */
export function mergeAttachmentPaths(
  singlePath?: string | null,
  pathList?: readonly string[] | null,
  baseDir: string = process.cwd()
): MergedPath[] {
  const candidates = [
    ...(singlePath ? [singlePath] : []),
    ...(pathList ?? []),
  ];

  const seen = new Set<string>();
  const merged: MergedPath[] = [];
  for (const candidate of candidates) {
    const absolute = path.resolve(baseDir, candidate);
    if (seen.has(absolute)) continue;
    seen.add(absolute);
    merged.push({ absolute, original: candidate });
  }
  return merged;
}

async function resolveOne(absolutePath: string, original: string): Promise<AttachmentHandle> {
  try {
    const info = await stat(absolutePath);
    if (!info.isFile()) {
      throw new AttachmentError(original, 'not a regular file');
    }
    await access(absolutePath, constants.R_OK);
    return {
      path: absolutePath,
      filename: path.basename(absolutePath),
      contentType: contentTypeFor(absolutePath),
      sizeBytes: info.size,
    };
  } catch (error) {
    if (error instanceof AttachmentError) throw error;
    throw new AttachmentError(original, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Resolve attachment inputs into an AttachmentSet.
 *
 * @throws AttachmentError when any path is missing or unreadable
 */
export async function resolveAttachments(
  singlePath?: string | null,
  pathList?: readonly string[] | null,
  options: ResolveOptions = {}
): Promise<AttachmentSet> {
  const handles: AttachmentHandle[] = [];
  // Sequential so the first missing path in merge order is the one reported.
  for (const { absolute, original } of mergeAttachmentPaths(singlePath, pathList, options.baseDir)) {
    handles.push(await resolveOne(absolute, original));
  }
  return handles;
}
