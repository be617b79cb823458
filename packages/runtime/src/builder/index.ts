export { LoadFileBuilder, createLoadFileBuilder, type LoadFileBuilderOptions } from './builder.js';
export {
  resolveTree,
  buildKeyIndex,
  lookupParent,
  depthFirst,
  ancestors,
  type EntryTree,
} from './tree.js';
