import { errorMessage, Logger } from '../helpers/logger';
import { listingItemToNode, type ListingItem } from '../helpers/normalize';
import type { FileNode, TraversalWarning } from '../types';

const log = new Logger('tree');

export type ListDirectory = (dir: string) => Promise<ListingItem[]>;

export interface WalkResult {
  tree: FileNode[];
  warnings: TraversalWarning[];
}

/**
 * Expand a root listing into a file tree, listing each directory in turn.
 * A directory whose listing fails keeps no children and yields a warning;
 * the walk carries on with its siblings.
 */
export async function walkTree(root: ListingItem[], listDirectory: ListDirectory): Promise<WalkResult> {
  const warnings: TraversalWarning[] = [];
  const visited = new Set<string>();

  const build = async (items: ListingItem[]): Promise<FileNode[]> => {
    const nodes: FileNode[] = [];

    for (const item of items) {
      if (!item.isDirectory || visited.has(item.path)) {
        nodes.push(listingItemToNode(item));
        continue;
      }
      visited.add(item.path);

      let listing: ListingItem[] | null = null;
      try {
        listing = await listDirectory(item.path);
      } catch (err) {
        const message = errorMessage(err);
        warnings.push({ path: item.path, message });
        log.warn('Directory listing failed', { path: item.path, error: message });
      }

      const children = listing ? await build(listing) : [];
      nodes.push(listingItemToNode(item, children));
    }

    return nodes;
  };

  const tree = await build(root);
  return { tree, warnings };
}
