import type { HealingPolicyInput } from "./policyEngine";

/** Built-in healing policies, used when configuration supplies none */
export const DEFAULT_POLICIES: readonly HealingPolicyInput[] = [
  {
    name: "high_latency_restart",
    conditions: [
      { metric: "latency_p99", operator: ">", threshold: 300 },
      { metric: "error_rate", operator: "<", threshold: 0.1 },
    ],
    actions: ["restart_container"],
    priority: 2,
    maxExecutionsPerHour: 10,
  },
  {
    name: "cascading_failure",
    conditions: [{ metric: "error_rate", operator: ">", threshold: 0.15 }],
    actions: ["circuit_breaker", "alert_team"],
    priority: 1,
    maxExecutionsPerHour: 5,
  },
  {
    name: "resource_exhaustion",
    conditions: [
      { metric: "cpu_util", operator: ">", threshold: 0.85 },
      { metric: "memory_util", operator: ">", threshold: 0.85 },
    ],
    actions: [{ tool: "scale_out", parameters: { increment: 1 } }, "alert_team"],
    priority: 1,
    maxExecutionsPerHour: 5,
  },
  {
    name: "moderate_performance_issue",
    conditions: [
      { metric: "latency_p99", operator: ">", threshold: 200 },
      { metric: "error_rate", operator: ">", threshold: 0.05 },
    ],
    actions: [{ tool: "traffic_shift", parameters: { weight: 50 } }],
    priority: 3,
    maxExecutionsPerHour: 10,
  },
  {
    name: "critical_failure",
    conditions: [
      { metric: "latency_p99", operator: ">", threshold: 500 },
      { metric: "error_rate", operator: ">", threshold: 0.1 },
    ],
    actions: [
      "restart_container",
      "alert_team",
      { tool: "traffic_shift", parameters: { weight: 100 } },
    ],
    priority: 1,
    maxExecutionsPerHour: 5,
  },
];
