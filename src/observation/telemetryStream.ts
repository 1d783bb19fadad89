/**
 * NDJSON telemetry reader with bounded concurrency.
 */

import { createInterface } from "readline";
import type { Readable } from "stream";
import { getErrorMessage } from "../utils/helpers";
import { logger } from "../utils/logger";

export type TelemetryHandler = (record: unknown) => Promise<void>;

export type StreamOptions = {
  /** Records handled at once; further lines wait for a free slot */
  concurrency: number;
  signal?: AbortSignal;
};

export type StreamStats = {
  lines: number;
  handled: number;
  malformed: number;
  failed: number;
};

/**
 * Feed each JSON line of `input` to `handler`. Blank lines are skipped,
 * malformed lines are logged and counted. Resolves once the input ends
 * (or the signal aborts) and every started handler has settled.
 */
export async function consumeTelemetry(
  input: Readable,
  handler: TelemetryHandler,
  options: StreamOptions,
): Promise<StreamStats> {
  const stats: StreamStats = { lines: 0, handled: 0, malformed: 0, failed: 0 };
  const inFlight = new Set<Promise<void>>();
  const rl = createInterface({ input, crlfDelay: Infinity });
  const stop = () => rl.close();
  options.signal?.addEventListener("abort", stop, { once: true });

  try {
    for await (const line of rl) {
      if (options.signal?.aborted) break;
      if (line.trim() === "") continue;
      stats.lines++;

      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch (err) {
        stats.malformed++;
        logger.rejected(`line ${stats.lines}`, getErrorMessage(err));
        continue;
      }

      const task = handler(record).then(
        () => {
          stats.handled++;
        },
        (err: unknown) => {
          stats.failed++;
          logger.result(false, "Telemetry handling failed", { Error: getErrorMessage(err) });
        },
      );
      inFlight.add(task);
      void task.finally(() => inFlight.delete(task));

      if (inFlight.size >= Math.max(1, options.concurrency)) {
        await Promise.race(inFlight);
      }
    }
  } finally {
    options.signal?.removeEventListener("abort", stop);
    await Promise.all([...inFlight]);
  }

  return stats;
}
