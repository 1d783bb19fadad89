import Docker from "dockerode";
import type { ToolResult } from "../types";
import { numberParam } from "./params";
import {
  type Tool,
  type ToolContext,
  type ToolMetadata,
  type ToolValidation,
  VALID,
  invalid,
} from "./types";

export type ContainerSummary = {
  id: string;
  name: string;
  image: string;
  state: string;
  status: string;
};

export type ContainerState = {
  name: string;
  status: string;
  running: boolean;
  restartCount: number;
  health?: string;
};

/** Container operations the tools need, independent of the docker client */
export type ContainerRuntime = {
  listContainers(): Promise<ContainerSummary[]>;
  restartContainer(name: string, timeoutSeconds: number): Promise<void>;
  inspectContainer(name: string): Promise<ContainerState>;
  /** Replica count of a replicated swarm service, null for global or unknown mode */
  serviceReplicas(name: string): Promise<number | null>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Spec.Mode.Replicated.Replicas of a service inspect document */
export function replicasFromInspect(info: unknown): number | null {
  if (!isRecord(info) || !isRecord(info.Spec)) return null;
  const mode = info.Spec.Mode;
  if (!isRecord(mode) || !isRecord(mode.Replicated)) return null;
  const replicas = mode.Replicated.Replicas;
  return typeof replicas === "number" && Number.isInteger(replicas) && replicas >= 0
    ? replicas
    : null;
}

export function createDockerRuntime(docker: Docker = new Docker()): ContainerRuntime {
  return {
    async listContainers() {
      const containers = await docker.listContainers({ all: true });

      return containers.map((container) => ({
        id: container.Id,
        name: container.Names?.[0]?.replace(/^\//, "") ?? "",
        image: container.Image,
        state: container.State,
        status: container.Status,
      }));
    },

    async restartContainer(name, timeoutSeconds) {
      await docker.getContainer(name).restart({ t: timeoutSeconds });
    },

    async inspectContainer(name) {
      const data = await docker.getContainer(name).inspect();
      const state = data.State;

      return {
        name: data.Name?.replace(/^\//, "") ?? name,
        status: state?.Status ?? "unknown",
        running: Boolean(state?.Running),
        restartCount: data.RestartCount ?? 0,
        health: state?.Health?.Status,
      };
    },

    async serviceReplicas(name) {
      const info: unknown = await docker.getService(name).inspect();
      return replicasFromInspect(info);
    },
  };
}

/**
 * Container backing a component: an exact name match, or a compose-style
 * `<project>-<component>-<n>` name.
 */
export function findContainer(
  containers: readonly ContainerSummary[],
  component: string,
): ContainerSummary | undefined {
  const composeName = new RegExp(`^[\\w.-]+[-_]${component}[-_]\\d+$`);
  return (
    containers.find((c) => c.name === component) ??
    containers.find((c) => composeName.test(c.name))
  );
}

export class RestartContainerTool implements Tool {
  readonly metadata: ToolMetadata = Object.freeze({
    name: "restart_container",
    description: "Restart the container backing a component",
    safetyLevel: "medium",
    timeoutMs: 60_000,
    requiredPermissions: ["docker:container:restart"],
    safeForBusinessHours: false,
  });

  constructor(private readonly runtime: ContainerRuntime) {}

  async validate(context: ToolContext): Promise<ToolValidation> {
    const containers = await this.runtime.listContainers();
    return findContainer(containers, context.component)
      ? VALID
      : invalid(`No container found for ${context.component}`);
  }

  async execute(context: ToolContext): Promise<ToolResult> {
    const container = findContainer(
      await this.runtime.listContainers(),
      context.component,
    );
    if (!container) {
      return { success: false, summary: `No container found for ${context.component}` };
    }

    const grace = numberParam(context.parameters, "gracePeriodSeconds", 10);
    await this.runtime.restartContainer(container.name, grace);
    const after = await this.runtime.inspectContainer(container.name);

    return after.running
      ? {
          success: true,
          summary: `Restarted ${after.name}`,
          output: `restarts=${after.restartCount}${after.health ? ` health=${after.health}` : ""}`,
        }
      : { success: false, summary: `${after.name} is ${after.status} after restart` };
  }
}
