import { describe, expect, it } from "vitest";

import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      projectId: undefined,
      location: "global",
      secretsFile: ".secrets/secrets.env",
      staticDir: "dist/public",
    });
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      GOOGLE_CLOUD_PROJECT: "demo-project",
      GOOGLE_CLOUD_LOCATION: "us-central1",
    });

    expect(config.port).toBe(8080);
    expect(config.projectId).toBe("demo-project");
    expect(config.location).toBe("us-central1");
  });

  it("throws on an invalid port", () => {
    expect(() => loadConfig({ PORT: "eighty" })).toThrow(/^Invalid configuration: PORT: /);
  });
});
