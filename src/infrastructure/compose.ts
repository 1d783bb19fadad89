/**
 * Docker Compose file parser. Supplies the component inventory and the
 * dependency graph used for blast-radius estimates.
 */

import { existsSync, readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import composeSchema from "./compose.schema.json";
import { ConfigError } from "../errors";
import { checkSchema } from "../utils/validateSchema";

type ComposeService = {
  container_name?: string;
  depends_on?: string[] | Record<string, unknown>;
};

type ComposeFile = {
  services: Record<string, ComposeService>;
};

export type Inventory = {
  /** Known component names; empty means "any component" */
  readonly components: readonly string[];
  /** Components that depend on this one, directly or transitively */
  dependentsOf(component: string): string[];
  /** The component itself plus everything that depends on it */
  blastRadiusOf(component: string): number;
};

export const EMPTY_INVENTORY: Inventory = createInventory({});

/**
 * Build an inventory from a map of component to the components it
 * depends on.
 */
export function createInventory(
  dependencies: Readonly<Record<string, readonly string[]>>,
): Inventory {
  const dependents = new Map<string, string[]>();
  for (const [component, deps] of Object.entries(dependencies)) {
    for (const dep of deps) {
      const list = dependents.get(dep) ?? [];
      list.push(component);
      dependents.set(dep, list);
    }
  }

  const dependentsOf = (component: string): string[] => {
    const seen = new Set<string>();
    const queue = [component];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      for (const next of dependents.get(current) ?? []) {
        if (next !== component && !seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }
    return [...seen].sort();
  };

  return {
    components: Object.freeze(Object.keys(dependencies).sort()),
    dependentsOf,
    blastRadiusOf: (component) => 1 + dependentsOf(component).length,
  };
}

function dependsOn(service: ComposeService): string[] {
  const deps = service.depends_on;
  if (!deps) return [];
  return Array.isArray(deps) ? deps : Object.keys(deps);
}

export function parseCompose(raw: string, source = "compose"): Inventory {
  const result = checkSchema<ComposeFile>(composeSchema, parseYaml(raw));
  if (!result.valid) {
    throw new ConfigError(
      source,
      result.issues.map((i) => `${i.field} ${i.message}`).join(", "),
    );
  }

  // Dependencies name services; the inventory speaks in container names.
  const nameOf = (serviceName: string): string =>
    result.data.services[serviceName]?.container_name ?? serviceName;

  const dependencies: Record<string, string[]> = {};
  for (const [serviceName, service] of Object.entries(result.data.services)) {
    dependencies[nameOf(serviceName)] = dependsOn(service).map(nameOf);
  }
  return createInventory(dependencies);
}

/**
 * Load the inventory from a compose file. A missing file yields the
 * empty inventory.
 */
export function loadInventory(composePath: string): Inventory {
  if (!existsSync(composePath)) return EMPTY_INVENTORY;
  return parseCompose(readFileSync(composePath, "utf-8"), composePath);
}
