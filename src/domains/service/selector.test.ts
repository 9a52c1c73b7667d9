import { describe, expect, it } from "vitest";

import {
  formatLabelSelector,
  matchesLabels,
  parseLabelSelector,
  resolveLabelQuery,
} from "./selector";
import type { ServiceRecord } from "./types";

const serviceWithSelector = (selector: Record<string, string>): ServiceRecord => ({
  uid: "uid-1",
  namespace: "default",
  name: "web",
  selector,
});

describe("resolveLabelQuery", () => {
  it("returns null for an empty selector", () => {
    expect(resolveLabelQuery(serviceWithSelector({}))).toBeNull();
  });

  it("builds key=value terms in lexicographic key order", () => {
    expect(resolveLabelQuery(serviceWithSelector({ tier: "web", app: "x" }))).toEqual({
      terms: ["app=x", "tier=web"],
    });
  });

  it("is deterministic regardless of insertion order", () => {
    const a = resolveLabelQuery(serviceWithSelector({ app: "x", tier: "web", env: "prod" }));
    const b = resolveLabelQuery(serviceWithSelector({ env: "prod", tier: "web", app: "x" }));
    expect(a).toEqual(b);
  });
});

describe("formatLabelSelector", () => {
  it("joins terms with commas", () => {
    expect(formatLabelSelector({ terms: ["app=x", "tier=web"] })).toBe("app=x,tier=web");
  });

  it("formats a single term", () => {
    expect(formatLabelSelector({ terms: ["app.kubernetes.io/name=web"] })).toBe(
      "app.kubernetes.io/name=web",
    );
  });
});

describe("parseLabelSelector", () => {
  it("parses equality terms", () => {
    expect(parseLabelSelector("app=x,tier=web")).toEqual({ app: "x", tier: "web" });
  });

  it("trims whitespace around terms", () => {
    expect(parseLabelSelector("app=x, tier=web")).toEqual({ app: "x", tier: "web" });
  });

  it("allows empty values", () => {
    expect(parseLabelSelector("canary=")).toEqual({ canary: "" });
  });

  it("rejects blank, inequality and set-based selectors", () => {
    expect(parseLabelSelector("")).toBeNull();
    expect(parseLabelSelector("app!=x")).toBeNull();
    expect(parseLabelSelector("app in (x,y)")).toBeNull();
    expect(parseLabelSelector("=x")).toBeNull();
  });
});

describe("matchesLabels", () => {
  it("matches when every selector entry is present", () => {
    expect(matchesLabels({ app: "x", tier: "web", pod: "a" }, { app: "x", tier: "web" })).toBe(true);
  });

  it("fails on a missing or different label", () => {
    expect(matchesLabels({ app: "x" }, { app: "x", tier: "web" })).toBe(false);
    expect(matchesLabels({ app: "y", tier: "web" }, { app: "x", tier: "web" })).toBe(false);
  });
});
