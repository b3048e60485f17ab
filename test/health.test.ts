// test/health.test.ts

import { describe, it, expect, beforeEach } from "vitest";
import {
  ComponentHealth,
  HealthAggregator,
  HealthCheckable,
  combineHealthStatus,
} from "../src/health";

class StaticComponent implements HealthCheckable {
  constructor(private readonly health: ComponentHealth) {}

  getHealth(): ComponentHealth {
    return this.health;
  }
}

describe("Health Check", () => {
  describe("combineHealthStatus", () => {
    it("should return the worst status", () => {
      expect(combineHealthStatus(["healthy", "healthy"])).toBe("healthy");
      expect(combineHealthStatus(["healthy", "degraded"])).toBe("degraded");
      expect(combineHealthStatus(["degraded", "unhealthy"])).toBe("unhealthy");
    });

    it("should return healthy for empty array", () => {
      expect(combineHealthStatus([])).toBe("healthy");
    });
  });

  describe("HealthAggregator", () => {
    let aggregator: HealthAggregator;

    beforeEach(() => {
      aggregator = new HealthAggregator("test-node");
    });

    it("should report components in registration order", async () => {
      aggregator.register(
        "peers",
        new StaticComponent({ name: "peers", status: "degraded", message: "0 of 1 peers" }),
      );
      aggregator.register(
        "store",
        new StaticComponent({ name: "store", status: "healthy" }),
      );

      const report = await aggregator.getHealth();

      expect(report.nodeId).toBe("test-node");
      expect(report.status).toBe("degraded");
      expect(report.components.map((c) => c.name)).toEqual(["peers", "store"]);
      expect(await aggregator.isReady()).toBe(true);
    });

    it("should mark a failing check unhealthy", async () => {
      aggregator.register("store", {
        getHealth: async () => {
          throw new Error("disk gone");
        },
      });

      const report = await aggregator.getHealth();

      expect(report.components).toEqual([
        {
          name: "store",
          status: "unhealthy",
          message: "Health check failed: disk gone",
        },
      ]);
      expect(await aggregator.isReady()).toBe(false);
    });

    it("should drop unregistered components", async () => {
      aggregator.register("store", new StaticComponent({ name: "store", status: "unhealthy" }));
      aggregator.unregister("store");

      const report = await aggregator.getHealth();
      expect(report.status).toBe("healthy");
      expect(report.components).toEqual([]);
    });
  });
});
