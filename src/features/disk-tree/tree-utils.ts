import type { DiskNode } from './disk-node';

/** Visits `node` and every descendant, parents before children. */
export function walkTree(node: DiskNode, visit: (node: DiskNode, depth: number) => void, depth = 0): void {
  visit(node, depth);
  for (const child of node.children) {
    walkTree(child, visit, depth + 1);
  }
}

export function countDescendants(root: DiskNode): { files: number; directories: number } {
  const counts = { files: 0, directories: 0 };
  walkTree(root, (node) => {
    if (node === root) return;
    if (node.isDirectory) counts.directories++;
    else counts.files++;
  });
  return counts;
}
