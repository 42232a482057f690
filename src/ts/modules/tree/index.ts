export type { EmptyNode, HorizontalNode, LeafNode, Node, SplitNode, VerticalNode } from './node';
export {
  appendTab,
  emptyNode,
  filterMapNode,
  insertTab,
  isLeaf,
  isSplit,
  leafNode,
  nodeBounds,
  removeTabFromLeaf,
  splitNode,
  tabsCount,
} from './node';
export { Tree, firstChild, parentOf, secondChild } from './tree';
