/**
 * Swarm-service remediation tools issued as docker CLI commands. Every
 * command passes the command validator before it runs.
 */

import { type CommandRunner, execCmd } from "../execution/executor";
import { CommandValidationError, validateCommand } from "../execution/validator";
import type { ToolResult } from "../types";
import { numberParam, stringParam } from "./params";
import {
  type Tool,
  type ToolContext,
  type ToolMetadata,
  type ToolValidation,
  VALID,
  invalid,
} from "./types";

export type DockerCliOptions = {
  run: CommandRunner;
  /** Components commands may target. Empty means only the intent's own component. */
  knownTargets: () => ReadonlySet<string>;
};

type CommandPlan = { command: string } | { error: string };

const MAX_REPLICAS = 50;
const MAX_INCREMENT = 10;

const IMAGE_REF = /^[\w][\w.\-/:@]*$/;

abstract class DockerCliTool implements Tool {
  abstract readonly metadata: ToolMetadata;
  private readonly options: DockerCliOptions;

  constructor(options: Partial<DockerCliOptions> = {}) {
    this.options = {
      run: execCmd,
      knownTargets: () => new Set<string>(),
      ...options,
    };
  }

  protected abstract plan(context: ToolContext): CommandPlan;

  /** The command to execute; tools that read live service state override this */
  protected async resolve(context: ToolContext): Promise<CommandPlan> {
    return this.plan(context);
  }

  validate(context: ToolContext): ToolValidation {
    const known = this.options.knownTargets();
    if (known.size > 0 && !known.has(context.component)) {
      return invalid(`${context.component} is not in the service inventory`);
    }

    const plan = this.plan(context);
    if ("error" in plan) return invalid(plan.error);

    try {
      validateCommand(plan.command, this.targets(context));
      return VALID;
    } catch (err) {
      if (err instanceof CommandValidationError) return invalid(err.reason);
      throw err;
    }
  }

  async execute(context: ToolContext): Promise<ToolResult> {
    const plan = await this.resolve(context);
    if ("error" in plan) return { success: false, summary: plan.error };
    validateCommand(plan.command, this.targets(context));

    const result = await this.options.run(plan.command, context.signal);
    return {
      success: result.success,
      summary: result.success
        ? `${this.metadata.name} applied to ${context.component}`
        : `${plan.command} exited with ${result.exitCode}`,
      output: result.stderr || result.stdout,
    };
  }

  private targets(context: ToolContext): ReadonlySet<string> {
    const known = this.options.knownTargets();
    return known.size > 0 ? known : new Set([context.component]);
  }
}

export type ScaleOutOptions = DockerCliOptions & {
  /** Current replica count of a service, null when it cannot be read */
  replicasOf: (service: string) => Promise<number | null>;
};

/** Adds `increment` replicas (default 1) to the service's current count */
export class ScaleOutTool extends DockerCliTool {
  readonly metadata: ToolMetadata = Object.freeze({
    name: "scale_out",
    description: "Add replicas to a swarm service",
    safetyLevel: "low",
    timeoutMs: 120_000,
    requiredPermissions: ["docker:service:update", "docker:service:inspect"],
    safeForBusinessHours: true,
  });

  private readonly replicasOf: ScaleOutOptions["replicasOf"];

  constructor(options: Partial<ScaleOutOptions> = {}) {
    const { replicasOf, ...cli } = options;
    super(cli);
    this.replicasOf = replicasOf ?? (async () => null);
  }

  // Validation plans against a single running replica.
  protected plan(context: ToolContext, current = 1): CommandPlan {
    const increment = numberParam(context.parameters, "increment", 1);
    if (!Number.isInteger(increment) || increment < 1 || increment > MAX_INCREMENT) {
      return { error: `increment must be an integer between 1 and ${MAX_INCREMENT}` };
    }
    const replicas = current + increment;
    if (replicas > MAX_REPLICAS) {
      return {
        error: `${context.component} would run ${replicas} replicas, above the limit of ${MAX_REPLICAS}`,
      };
    }
    return { command: `docker service update --replicas ${replicas} ${context.component}` };
  }

  protected async resolve(context: ToolContext): Promise<CommandPlan> {
    const current = await this.replicasOf(context.component);
    if (current === null) {
      return { error: `Replica count of ${context.component} is unknown` };
    }
    return this.plan(context, current);
  }
}

export class RollbackTool extends DockerCliTool {
  readonly metadata: ToolMetadata = Object.freeze({
    name: "rollback",
    description: "Redeploy a service on a known-good image",
    safetyLevel: "high",
    timeoutMs: 180_000,
    requiredPermissions: ["docker:service:update"],
  });

  protected plan(context: ToolContext): CommandPlan {
    const image = stringParam(context.parameters, "image");
    if (!image) {
      return { error: "No backup image to roll back to" };
    }
    if (!IMAGE_REF.test(image)) {
      return { error: `Invalid image reference: ${image}` };
    }
    return { command: `docker service update --image ${image} ${context.component}` };
  }
}

export class CircuitBreakerTool extends DockerCliTool {
  readonly metadata: ToolMetadata = Object.freeze({
    name: "circuit_breaker",
    description: "Mark a service's circuit open so the proxy sheds its traffic",
    safetyLevel: "medium",
    timeoutMs: 60_000,
    requiredPermissions: ["docker:service:update"],
    safeForBusinessHours: true,
  });

  protected plan(context: ToolContext): CommandPlan {
    return {
      command: `docker service update --label-add healgate.circuit=open ${context.component}`,
    };
  }
}

export class TrafficShiftTool extends DockerCliTool {
  readonly metadata: ToolMetadata = Object.freeze({
    name: "traffic_shift",
    description: "Shift a percentage of a service's traffic to its standby",
    safetyLevel: "medium",
    timeoutMs: 60_000,
    requiredPermissions: ["docker:service:update"],
  });

  protected plan(context: ToolContext): CommandPlan {
    const weight = numberParam(context.parameters, "weight", 50);
    if (!Number.isInteger(weight) || weight < 0 || weight > 100) {
      return { error: "weight must be an integer percentage" };
    }
    return {
      command: `docker service update --label-add healgate.traffic.shift=${weight} ${context.component}`,
    };
  }
}
