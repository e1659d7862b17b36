export { childCount, createDiskNode, type DiskNode, type DiskNodeInit } from './disk-node';
export {
  compareNodes,
  describeSort,
  sortChildren,
  type SortMode
} from './sort';
export { assembleTree, buildTree, pathDepth, type ScannedEntry } from './tree-builder';
export { countDescendants, walkTree } from './tree-utils';
