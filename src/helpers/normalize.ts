import { z } from 'zod';
import type { HttpResponse } from '../transport/httpTransport';
import type { FileNode } from '../types';
import { ExtractionError } from '../types/errors';
import { classifyFile } from './fileType';

/**
 * Decode and validate a JSON response body. Anything unparseable or of the
 * wrong shape becomes an `ExtractionError` naming the source.
 */
export function parseJsonBody<T extends z.ZodTypeAny>(
  response: HttpResponse,
  schema: T,
  source: string,
): z.output<T> {
  let body: unknown;
  try {
    body = response.json();
  } catch {
    throw new ExtractionError(`Malformed response from ${source}`);
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ExtractionError(`Unexpected response from ${source}`);
  }
  return parsed.data;
}

/** Ids and timestamps arrive as numbers or strings depending on the endpoint. */
export const idString = z.union([z.string(), z.number()]).transform(String);

const flag = z.union([z.number(), z.string(), z.boolean()]).transform(v => Number(v) !== 0);

const byteCount = z
  .union([z.number(), z.string()])
  .optional()
  .transform(v => {
    const n = Number(v ?? 0);
    return Number.isFinite(n) && n > 0 ? n : 0;
  });

/** One entry of a share listing, as returned by every share-listing endpoint. */
export const listingItemSchema = z
  .object({
    isdir: flag.default(0),
    path: z.string(),
    fs_id: idString,
    server_filename: z.string(),
    size: byteCount,
    thumbs: z.object({ url3: z.string().optional() }).partial().optional(),
    dlink: z.string().optional(),
  })
  .transform(item => ({
    isDirectory: item.isdir,
    path: item.path,
    fsId: item.fs_id,
    name: item.server_filename,
    sizeBytes: item.size,
    thumbnailUrl: item.thumbs?.url3 ?? '',
    dlink: item.dlink || undefined,
  }));

export type ListingItem = z.output<typeof listingItemSchema>;

/** Root listing plus share identity (`/api/shorturlinfo`). */
export const shareInfoSchema = z.object({
  errno: z.number().default(0),
  errmsg: z.string().optional(),
  shareid: idString.optional(),
  uk: idString.optional(),
  sign: z.string().optional(),
  timestamp: idString.optional(),
  list: z.array(listingItemSchema).default([]),
});

export type ShareInfoResponse = z.output<typeof shareInfoSchema>;

/** Directory listing (`/share/list`). */
export const shareListSchema = z.object({
  errno: z.number().default(0),
  errmsg: z.string().optional(),
  list: z.array(listingItemSchema).default([]),
});

/** Item of the commercial API's response, before links are split off. */
export interface CommercialItem {
  remoteId: string;
  name: string;
  sizeBytes: number;
  thumbnailUrl: string;
  directLink: string;
  downloadLink: string;
}

/**
 * Listing as each family of backends returns it. Share-API listings are
 * hierarchical and walked by the tree walker; commercial listings are flat.
 */
export type RawListing =
  | { source: 'share-api'; items: ListingItem[] }
  | { source: 'commercial'; items: CommercialItem[] };

export function listingItemToNode(item: ListingItem, children: FileNode[] = []): FileNode {
  if (item.isDirectory) {
    return {
      isDirectory: true,
      path: item.path,
      remoteId: item.fsId,
      name: item.name,
      type: 'other',
      sizeBytes: 0,
      thumbnailUrl: '',
      children,
    };
  }

  const node: FileNode = {
    isDirectory: false,
    path: item.path,
    remoteId: item.fsId,
    name: item.name,
    type: classifyFile(item.name),
    sizeBytes: item.sizeBytes,
    thumbnailUrl: item.thumbnailUrl,
    children: [],
  };
  if (item.dlink) node.directLink = item.dlink;
  return node;
}

export function commercialItemToNode(item: CommercialItem): FileNode {
  return {
    isDirectory: false,
    path: `/${item.name}`,
    remoteId: item.remoteId,
    name: item.name,
    type: classifyFile(item.name),
    sizeBytes: item.sizeBytes,
    thumbnailUrl: item.thumbnailUrl,
    children: [],
    directLink: item.directLink,
  };
}

/**
 * Flat listings become file nodes directly; share-API listings become their
 * top level only (children are filled by the tree walker).
 */
export function normalizeListing(raw: RawListing): FileNode[] {
  switch (raw.source) {
    case 'share-api':
      return raw.items.map(item => listingItemToNode(item));
    case 'commercial':
      return raw.items.map(commercialItemToNode);
  }
}

/** Collect every node of a tree, depth first. */
export function flattenTree(nodes: FileNode[]): FileNode[] {
  return nodes.flatMap(node => [node, ...flattenTree(node.children)]);
}
