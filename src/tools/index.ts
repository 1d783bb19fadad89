import type { CommandRunner } from "../execution/executor";
import { type AlertSink, AlertTeamTool } from "./alertTeam";
import { type ContainerRuntime, RestartContainerTool, createDockerRuntime } from "./docker";
import { CircuitBreakerTool, RollbackTool, ScaleOutTool, TrafficShiftTool } from "./dockerCli";
import { ToolRegistry } from "./registry";

export type BuiltinToolDeps = {
  runtime?: ContainerRuntime;
  run?: CommandRunner;
  knownTargets?: () => ReadonlySet<string>;
  alertSink?: AlertSink;
};

export function createBuiltinRegistry(deps: BuiltinToolDeps = {}): ToolRegistry {
  const cli = {
    ...(deps.run ? { run: deps.run } : {}),
    ...(deps.knownTargets ? { knownTargets: deps.knownTargets } : {}),
  };

  const runtime = deps.runtime ?? createDockerRuntime();

  return new ToolRegistry([
    new RestartContainerTool(runtime),
    new ScaleOutTool({ ...cli, replicasOf: (service) => runtime.serviceReplicas(service) }),
    new RollbackTool(cli),
    new CircuitBreakerTool(cli),
    new TrafficShiftTool(cli),
    new AlertTeamTool(deps.alertSink),
  ]);
}
