/**
 * Service filtering by name and namespace.
 */

import type { ServiceFilter, ServiceRecord } from "./types";

const isNonEmpty = (list: readonly string[] | undefined): list is readonly string[] =>
  list !== undefined && list.length > 0;

export const hasNameIn =
  (names: readonly string[]) =>
  (service: ServiceRecord): boolean =>
    service.name !== null && names.includes(service.name);

export const isInNamespaces =
  (namespaces: readonly string[]) =>
  (service: ServiceRecord): boolean =>
    service.namespace !== null && namespaces.includes(service.namespace);

/**
 * Narrow `services` to those in scope.
 *
 * Name and include rules are allow-lists that only apply when non-empty.
 * Exclusion runs last, so a namespace in both include and exclude lists is
 * excluded. Relative order is preserved.
 */
export const filterServices = (
  services: readonly ServiceRecord[],
  filter: ServiceFilter = {},
): ServiceRecord[] => {
  const { serviceNames, includeNamespaces, excludeNamespaces } = filter;
  let result = [...services];

  if (isNonEmpty(serviceNames)) {
    result = result.filter(hasNameIn(serviceNames));
  }

  if (isNonEmpty(includeNamespaces)) {
    result = result.filter(isInNamespaces(includeNamespaces));
  }

  if (isNonEmpty(excludeNamespaces)) {
    const excluded = isInNamespaces(excludeNamespaces);
    result = result.filter((service) => !excluded(service));
  }

  return result;
};
