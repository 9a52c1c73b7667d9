/**
 * Service records and label queries.
 */

/**
 * Snapshot of a cluster service as seen by the check.
 *
 * `name` and `namespace` are null when the API returned an object without
 * metadata; such services cannot be checked and are reported as unresolved.
 */
export interface ServiceRecord {
  uid: string | null;
  namespace: string | null;
  name: string | null;
  /** Label selector; empty when the service selects nothing. */
  selector: Readonly<Record<string, string>>;
}

/**
 * Sorted `key=value` terms derived from a non-empty selector.
 */
export interface LabelQuery {
  readonly terms: readonly [string, ...string[]];
}

export interface ServiceFilter {
  /** Allow-list of service names; empty means every name. */
  serviceNames?: readonly string[];
  /** Allow-list of namespaces; empty means every namespace. */
  includeNamespaces?: readonly string[];
  /** Deny-list of namespaces, applied after includeNamespaces. */
  excludeNamespaces?: readonly string[];
}

/**
 * Identifier used when a service is listed as unresolved or failed.
 */
export const describeService = (service: ServiceRecord): string => {
  if (service.name) {
    return service.name;
  }
  return service.uid ? `uid:${service.uid}` : "<unnamed>";
};
