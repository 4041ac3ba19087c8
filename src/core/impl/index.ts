export { ArrayHeap, heapify } from "./arrayHeap.js";
export { compareKeys, createOrder, sameValueZero } from "./keyOrder.js";
export { PriorityQueue } from "./priorityQueue.js";
export { intersectSorted, subtractSorted } from "./sortedMerge.js";
