import { describe, expect, it } from "vitest";

import { filterServices, hasNameIn, isInNamespaces } from "./filter";
import type { ServiceRecord } from "./types";

const createService = (overrides?: Partial<ServiceRecord>): ServiceRecord => ({
  uid: "uid-web",
  namespace: "default",
  name: "web",
  selector: { app: "web" },
  ...overrides,
});

const services: ServiceRecord[] = [
  createService({ uid: "1", namespace: "default", name: "web" }),
  createService({ uid: "2", namespace: "default", name: "api" }),
  createService({ uid: "3", namespace: "kube-system", name: "kube-dns" }),
  createService({ uid: "4", namespace: "monitoring", name: "web" }),
];

const names = (result: ServiceRecord[]): string[] =>
  result.map((service) => `${service.namespace}/${service.name}`);

describe("filterServices", () => {
  it("returns the services unchanged when no filter is set", () => {
    expect(filterServices(services)).toEqual(services);
    expect(filterServices(services, {})).toEqual(services);
  });

  it("treats empty lists as unset", () => {
    expect(
      filterServices(services, { serviceNames: [], includeNamespaces: [], excludeNamespaces: [] }),
    ).toEqual(services);
  });

  it("does not mutate the input", () => {
    const input = [...services];
    filterServices(input, { excludeNamespaces: ["default"] });
    expect(input).toEqual(services);
  });

  it("keeps only listed service names", () => {
    expect(names(filterServices(services, { serviceNames: ["web"] }))).toEqual([
      "default/web",
      "monitoring/web",
    ]);
  });

  it("keeps only included namespaces", () => {
    expect(names(filterServices(services, { includeNamespaces: ["kube-system", "monitoring"] }))).toEqual([
      "kube-system/kube-dns",
      "monitoring/web",
    ]);
  });

  it("removes excluded namespaces", () => {
    expect(names(filterServices(services, { excludeNamespaces: ["default"] }))).toEqual([
      "kube-system/kube-dns",
      "monitoring/web",
    ]);
  });

  it("lets exclusion win over inclusion for the same namespace", () => {
    const result = filterServices(services, {
      includeNamespaces: ["default", "monitoring"],
      excludeNamespaces: ["default"],
    });
    expect(names(result)).toEqual(["monitoring/web"]);
  });

  it("combines name and namespace rules", () => {
    const result = filterServices(services, {
      serviceNames: ["web", "kube-dns"],
      excludeNamespaces: ["monitoring"],
    });
    expect(names(result)).toEqual(["default/web", "kube-system/kube-dns"]);
  });

  it("returns an empty list when nothing matches", () => {
    expect(filterServices(services, { serviceNames: ["missing"] })).toEqual([]);
  });

  it("drops services without a name or namespace only when a rule needs them", () => {
    const anonymous = createService({ uid: "5", name: null, namespace: null });
    const input = [...services, anonymous];

    expect(filterServices(input, { excludeNamespaces: ["default"] })).toContain(anonymous);
    expect(filterServices(input, { serviceNames: ["web"] })).not.toContain(anonymous);
    expect(filterServices(input, { includeNamespaces: ["default"] })).not.toContain(anonymous);
  });
});

describe("predicates", () => {
  it("hasNameIn matches on service name", () => {
    expect(hasNameIn(["web"])(createService())).toBe(true);
    expect(hasNameIn(["api"])(createService())).toBe(false);
    expect(hasNameIn(["web"])(createService({ name: null }))).toBe(false);
  });

  it("isInNamespaces matches on namespace", () => {
    expect(isInNamespaces(["default"])(createService())).toBe(true);
    expect(isInNamespaces(["prod"])(createService())).toBe(false);
    expect(isInNamespaces(["default"])(createService({ namespace: null }))).toBe(false);
  });
});
