import { describe, it, expect } from "vitest";
import { EnvironmentRegistry } from "./registry";
import { DuplicateNameError, NotFoundError } from "../types/errors";

interface Entry {
  name: string;
  origin: string;
}

describe("EnvironmentRegistry", () => {
  it("should look up registered entries by name", () => {
    const registry = new EnvironmentRegistry<Entry>();
    registry.register({ name: "dev", origin: "a.json" });

    expect(registry.lookup("dev")).toEqual({ name: "dev", origin: "a.json" });
    expect(registry.has("dev")).toBe(true);
    expect(registry.has("production")).toBe(false);
  });

  it("should reject a second entry with the same name and keep the first", () => {
    const registry = new EnvironmentRegistry<Entry>();
    registry.register({ name: "dev", origin: "a.json" });

    expect(() => registry.register({ name: "dev", origin: "b.json" })).toThrow(DuplicateNameError);
    expect(() => registry.register({ name: "dev", origin: "b.json" })).toThrow(
      'Environment "dev" is already registered',
    );
    expect(registry.lookup("dev").origin).toBe("a.json");
    expect(registry.size).toBe(1);
  });

  it("should list known environments when a lookup misses", () => {
    const registry = new EnvironmentRegistry<Entry>();
    registry.register({ name: "dev", origin: "a.json" });
    registry.register({ name: "production", origin: "a.json" });

    expect(() => registry.lookup("qa")).toThrow(
      'Environment "qa" not found. Known environments: dev, production',
    );
  });

  it("should say none when nothing is registered", () => {
    const registry = new EnvironmentRegistry<Entry>();

    let caught: unknown;
    try {
      registry.lookup("dev");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NotFoundError);
    if (caught instanceof NotFoundError) {
      expect(caught.message).toBe('Environment "dev" not found. Known environments: none');
      expect(caught.knownEnvironments).toEqual([]);
      expect(caught.code).toBe("ENVIRONMENT_NOT_FOUND");
    }
  });

  it("should keep registration order", () => {
    const registry = new EnvironmentRegistry<Entry>();
    for (const name of ["staging", "dev", "production"]) {
      registry.register({ name, origin: "a.json" });
    }

    expect(registry.names()).toEqual(["staging", "dev", "production"]);
    expect(registry.all().map((entry) => entry.name)).toEqual(["staging", "dev", "production"]);
  });
});
