export { estimateCost, rawDocumentCost } from "./cost";
export type { CostContext, LimitEntry } from "./cost";
