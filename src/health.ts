// src/health.ts

/**
 * Health status of a component.
 */
export type HealthStatus = "healthy" | "degraded" | "unhealthy";

/**
 * Health check result for a single component.
 */
export interface ComponentHealth {
  name: string;
  status: HealthStatus;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Overall node health.
 */
export interface HealthReport {
  /** Worst status among the components. */
  status: HealthStatus;
  timestamp: Date;
  nodeId: string;
  components: ComponentHealth[];
  uptimeMs: number;
}

export interface HealthCheckable {
  getHealth(): ComponentHealth | Promise<ComponentHealth>;
}

/**
 * Combines multiple health statuses, returning the worst one.
 */
export function combineHealthStatus(statuses: HealthStatus[]): HealthStatus {
  if (statuses.includes("unhealthy")) return "unhealthy";
  if (statuses.includes("degraded")) return "degraded";
  return "healthy";
}

/**
 * Collects health from the node's components. A component whose check
 * throws is reported as unhealthy.
 */
export class HealthAggregator {
  private readonly startTime = Date.now();
  private readonly components = new Map<string, HealthCheckable>();

  constructor(private readonly nodeId: string) {}

  register(name: string, component: HealthCheckable): void {
    this.components.set(name, component);
  }

  unregister(name: string): void {
    this.components.delete(name);
  }

  async getHealth(): Promise<HealthReport> {
    const componentHealths: ComponentHealth[] = [];

    for (const [name, component] of this.components) {
      try {
        componentHealths.push(await component.getHealth());
      } catch (err) {
        componentHealths.push({
          name,
          status: "unhealthy",
          message: `Health check failed: ${err instanceof Error ? err.message : String(err)}`,
        });
      }
    }

    return {
      status: combineHealthStatus(componentHealths.map((c) => c.status)),
      timestamp: new Date(),
      nodeId: this.nodeId,
      components: componentHealths,
      uptimeMs: Date.now() - this.startTime,
    };
  }

  /** True unless some component reports unhealthy. */
  async isReady(): Promise<boolean> {
    const report = await this.getHealth();
    return report.status !== "unhealthy";
  }
}
