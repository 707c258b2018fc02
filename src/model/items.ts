import path from 'node:path';
import { z } from 'zod';
import fileTypes from '../data/file-types.json';
import { ValidationError } from '../errors.js';
import { normalizeTag, normalizeTags } from '../utils/tokenize.js';
import type { ItemInput, LibraryItem } from '../types/Library.js';

export const DEFAULT_CATEGORY = 'Uncategorized';

const MEDIA_TYPES = new Set<string>([...fileTypes.video, ...fileTypes.audio]);
const DOCUMENT_TYPES = new Set<string>(fileTypes.document);

export const isoDate = z.string().refine(s => !Number.isNaN(Date.parse(s)), 'must be an ISO-8601 timestamp');

export const itemSchema = z.object({
  id: z.string().min(1, 'must not be empty'),
  title: z.string(),
  category: z.string(),
  tags: z.array(z.string()),
  rating: z.number().int('must be an integer').min(0, 'must be between 0 and 5').max(5, 'must be between 0 and 5'),
  description: z.string(),
  filePath: z.string().min(1, 'must not be empty').optional(),
  mediaUrl: z.string().min(1, 'must not be empty').optional(),
  fileType: z.string().optional(),
  fileSize: z.number().int('must be an integer').nonnegative('must not be negative'),
  createdAt: isoDate,
  lastModified: isoDate,
});

/** Throws ValidationError naming the first offending field. */
export function validateItem(item: LibraryItem): void {
  const result = itemSchema.safeParse(item);
  if (result.success) return;
  const issue = result.error.issues[0];
  throw new ValidationError(issue.path.join('.') || 'item', issue.message);
}

function compact(item: LibraryItem): LibraryItem {
  const out: LibraryItem = { ...item };
  if (out.filePath === undefined) delete out.filePath;
  if (out.mediaUrl === undefined) delete out.mediaUrl;
  if (out.fileType === undefined) delete out.fileType;
  return out;
}

function deriveFileType(filePath: string | undefined, fileType: string | undefined): string | undefined {
  if (fileType) return fileType.toLowerCase();
  if (!filePath) return undefined;
  const ext = path.extname(filePath).toLowerCase();
  return ext || undefined;
}

/** Builds a normalized item from caller input. Does not validate. */
export function buildItem(input: ItemInput, id: string, nowIso: string): LibraryItem {
  const createdAt = input.createdAt ?? nowIso;
  return compact({
    id,
    title: input.title,
    category: input.category ?? DEFAULT_CATEGORY,
    tags: normalizeTags(input.tags),
    rating: input.rating ?? 0,
    description: input.description ?? '',
    filePath: input.filePath,
    mediaUrl: input.mediaUrl,
    fileType: deriveFileType(input.filePath, input.fileType),
    fileSize: input.fileSize ?? 0,
    createdAt,
    lastModified: createdAt,
  });
}

/**
 * Applies an update over the stored version. Identity and creation time always
 * come from `stored`; `lastModified` is refreshed.
 */
export function mergeItem(stored: LibraryItem, update: Partial<LibraryItem>, nowIso: string): LibraryItem {
  const merged: LibraryItem = {
    ...stored,
    ...update,
    id: stored.id,
    createdAt: stored.createdAt,
    lastModified: nowIso,
  };
  merged.tags = normalizeTags(update.tags ?? stored.tags);
  if (update.filePath !== stored.filePath && update.fileType === undefined && 'filePath' in update) {
    merged.fileType = deriveFileType(merged.filePath, undefined);
  }
  return compact(merged);
}

/** Value copy: the only mutable member is the tag array. */
export function cloneItem(item: LibraryItem): LibraryItem {
  return { ...item, tags: [...item.tags] };
}

export function hasTag(item: LibraryItem, tag: string): boolean {
  return item.tags.includes(normalizeTag(tag));
}

export function hasMedia(item: LibraryItem): boolean {
  if (item.mediaUrl) return true;
  if (!item.filePath) return false;
  if (item.fileType && MEDIA_TYPES.has(item.fileType.toLowerCase())) return true;
  return MEDIA_TYPES.has(path.extname(item.filePath).toLowerCase());
}

export function isDocument(item: LibraryItem): boolean {
  return item.fileType !== undefined && DOCUMENT_TYPES.has(item.fileType.toLowerCase());
}
