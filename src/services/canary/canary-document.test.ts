import { describe, it, expect } from "vitest";
import { readCanary, writeCanary } from "./canary-document.js";
import { createDefaultCanary } from "./types.js";

describe("readCanary", () => {
  it("returns the defaults when the section is missing", () => {
    expect(readCanary({})).toEqual(createDefaultCanary());
  });

  it("lists every service integration even when the document names only some", () => {
    const canary = readCanary({
      canary: {
        enabled: true,
        serviceIntegrations: [
          { name: "prometheus", enabled: true, accounts: [{ name: "metrics", endpoint: "http://prometheus:9090" }] }
        ]
      }
    });

    expect(canary.enabled).toBe(true);
    expect(canary.serviceIntegrations.map((integration) => integration.name)).toEqual([
      "google",
      "prometheus",
      "datadog",
      "signalfx",
      "newrelic",
      "aws"
    ]);
    expect(canary.serviceIntegrations[1]).toEqual({
      name: "prometheus",
      enabled: true,
      accounts: [{ name: "metrics", endpoint: "http://prometheus:9090" }]
    });
  });

  it("drops the default judge when the document leaves it out", () => {
    expect(readCanary({ canary: { enabled: false } }).defaultJudge).toBeUndefined();
  });

  it("keeps nameless accounts so validation can report them", () => {
    const canary = readCanary({
      canary: { serviceIntegrations: [{ name: "google", accounts: [{ project: "p" }] }] }
    });

    expect(canary.serviceIntegrations[0].accounts).toEqual([{ name: "", project: "p" }]);
  });

  it("names the offending field", () => {
    expect(() => readCanary({ canary: { enabled: "yes" } })).toThrow(
      "Invalid canary settings at canary.enabled: expected a boolean."
    );
    expect(() =>
      readCanary({ canary: { serviceIntegrations: [{ name: "splunk" }] } })
    ).toThrow(
      'Invalid canary settings at canary.serviceIntegrations.0.name: unknown service integration "splunk".'
    );
    expect(() => readCanary({ canary: [] })).toThrow(
      "Invalid canary settings at canary: expected a mapping."
    );
  });
});

describe("writeCanary", () => {
  it("writes a section that reads back the same", () => {
    const canary = createDefaultCanary();
    canary.enabled = true;
    canary.defaultMetricsAccount = "metrics";
    canary.serviceIntegrations[0].accounts.push({ name: "gcs", bucket: "canary-bucket" });
    const document = { other: { kept: true } };

    writeCanary(document, canary);

    expect(document.other).toEqual({ kept: true });
    expect(readCanary(document)).toEqual(canary);
  });

  it("omits unset optional fields", () => {
    const canary = createDefaultCanary();
    delete canary.defaultJudge;
    const document = {};

    writeCanary(document, canary);

    expect(document).toEqual({
      canary: {
        enabled: false,
        reduxLoggerEnabled: true,
        stagesEnabled: true,
        templatesEnabled: true,
        showAllConfigsEnabled: true,
        serviceIntegrations: [
          { name: "google", enabled: false, accounts: [] },
          { name: "prometheus", enabled: false, accounts: [] },
          { name: "datadog", enabled: false, accounts: [] },
          { name: "signalfx", enabled: false, accounts: [] },
          { name: "newrelic", enabled: false, accounts: [] },
          { name: "aws", enabled: false, accounts: [] }
        ]
      }
    });
  });
});
