/**
 * Label selector resolution: service selector map -> equality label query.
 */

import type { LabelQuery, ServiceRecord } from "./types";

/**
 * Build the label query for a service, or null if its selector is empty.
 * An empty selector would match every pod in the cluster, so callers must not
 * issue a lookup for it.
 */
export const resolveLabelQuery = (service: ServiceRecord): LabelQuery | null => {
  const terms = Object.keys(service.selector)
    .sort()
    .map((key) => `${key}=${service.selector[key]}`);

  const [first, ...rest] = terms;
  if (first === undefined) {
    return null;
  }
  return { terms: [first, ...rest] };
};

export const formatLabelSelector = (query: LabelQuery): string => query.terms.join(",");

/**
 * Parse an equality-based selector (`a=b,c=d`) back into a map.
 * Returns null for anything else (set-based or `!=` terms, blank input).
 */
export const parseLabelSelector = (selector: string): Record<string, string> | null => {
  const labels: Record<string, string> = {};
  const terms = selector.split(",").map((term) => term.trim());

  for (const term of terms) {
    const separator = term.indexOf("=");
    if (separator <= 0 || term.includes("!=") || term.includes("==")) {
      return null;
    }
    labels[term.slice(0, separator)] = term.slice(separator + 1);
  }

  return labels;
};

export const matchesLabels = (
  labels: Readonly<Record<string, string>>,
  selector: Readonly<Record<string, string>>,
): boolean => Object.entries(selector).every(([key, value]) => labels[key] === value);
