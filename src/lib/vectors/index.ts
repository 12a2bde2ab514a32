export type { Vector } from "./math";
export { NORMALIZE_EPSILON, dotProduct, norm, normalize } from "./math";
