export { BinaryHeap } from "./binaryHeap.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
export { shortestPaths, pathTo, type ShortestPaths } from "./shortestPaths.js";
