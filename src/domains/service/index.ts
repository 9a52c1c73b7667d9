/**
 * Service domain: records, filtering, and label selector resolution.
 */

export type { LabelQuery, ServiceFilter, ServiceRecord } from "./types";
export { describeService } from "./types";

export { filterServices, hasNameIn, isInNamespaces } from "./filter";

export {
  formatLabelSelector,
  matchesLabels,
  parseLabelSelector,
  resolveLabelQuery,
} from "./selector";
