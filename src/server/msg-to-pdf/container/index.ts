export { DEFAULT_MAX_EMBED_DEPTH, type ReadOptions, readContainer, toBytes } from "./reader.js";
export { type ContainerNode, ContainerTree, type NodeHandle, type NodeKind, type PropertySource } from "./tree.js";
