// Typeclasses
export type { ContainerAdapter } from "./typeclasses.js";

// Data structures
export { SortedSet, type SortedSetF } from "./sorted-set.js";

// Instances
export { sequence, hashSet, orderedSet } from "./instances.js";
