/**
 * healgate entry point
 *
 * Reads NDJSON telemetry from stdin and runs each record through the
 * decision pipeline. Execution stays advisory: no entitlement verifier
 * is wired into this binary.
 */

import path from "path";
import { loadConfig } from "./config/loadConfig";
import type { Capability } from "./gateway/safetyGateway";
import { exportAuditLog, exportIntents } from "./infrastructure/auditExport";
import { EMPTY_INVENTORY, loadInventory } from "./infrastructure/compose";
import { consumeTelemetry } from "./observation/telemetryStream";
import { createContext } from "./orchestration/context";
import type { HealingIntent } from "./types";
import { getErrorMessage } from "./utils/helpers";
import { logger } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const inventory = config.inventory.composePath
    ? loadInventory(path.resolve(process.cwd(), config.inventory.composePath))
    : EMPTY_INVENTORY;

  const capability: Capability = {
    executionPermitted: false,
    approvalWorkflows: false,
    maxBlastRadius: config.gateway.maxBlastRadius,
  };
  const context = createContext(config, {
    capability,
    inventory,
  });

  logger.startup(
    [...inventory.components],
    config.mode,
    capability.executionPermitted,
  );
  logger.listening();

  const controller = new AbortController();
  const intents: HealingIntent[] = [];
  let stopping = false;

  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    controller.abort();
    logger.shutdown();
    await context.dispose();
    if (config.audit.exportPath) {
      const count = exportAuditLog(config.audit.exportPath, context.gateway.audit.records());
      logger.info(`Exported ${count} audit record(s) to ${config.audit.exportPath}`);
    }
    if (config.audit.intentsPath) {
      const count = exportIntents(config.audit.intentsPath, intents);
      logger.info(`Exported ${count} intent(s) to ${config.audit.intentsPath}`);
    }
  };

  const onSignal = () => {
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.result(false, "Shutdown failed", { Error: getErrorMessage(err) });
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const stats = await consumeTelemetry(
    process.stdin,
    async (record) => {
      const result = await context.pipeline.process(record, { signal: controller.signal });
      intents.push(...result.healingIntents);
      if (result.status === "ANOMALY") logger.listening();
    },
    { concurrency: config.pipeline.concurrency, signal: controller.signal },
  );

  logger.info(
    `Input closed: ${stats.handled} handled, ${stats.malformed} malformed, ${stats.failed} failed`,
  );
  await shutdown();
}

main().catch((err) => {
  logger.result(false, "Startup failed", { Error: getErrorMessage(err) });
  process.exit(1);
});
