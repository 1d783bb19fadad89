/**
 * Unified logging utility for healgate.
 * Set HEALGATE_LOG=silent to suppress output (the test config does).
 */

import type {
  Classification,
  GatewayResponse,
  HealingIntent,
  RecalledIncident,
} from "../types";

// ANSI colors & icons
const COLORS = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  dim: "\x1b[90m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
  white: "\x1b[97m",
  gray: "\x1b[37m",
} as const;

const ICONS = {
  success: "✓",
  failure: "✗",
  warning: "⚠",
  pending: "?",
};

type ColorName = keyof typeof COLORS;
type Details = Record<string, string | number | boolean>;
const ANSI_REGEX = /\x1b\[[0-9;]*m/g;

const LEVEL_COLORS: Record<Classification["level"], ColorName> = {
  NORMAL: "green",
  DEGRADING: "yellow",
  CRITICAL: "red",
  SYSTEMIC: "magenta",
};

function silent(): boolean {
  return process.env.HEALGATE_LOG === "silent";
}

function out(line = ""): void {
  if (!silent()) console.log(line);
}

// Color helpers
const c = (color: ColorName, text: string): string =>
  COLORS[color] + text + COLORS.reset;

const cb = (color: ColorName, text: string): string =>
  COLORS.bright + COLORS[color] + text + COLORS.reset;

// Time & text helpers
function getTimestamp(): string {
  return new Date().toISOString().slice(11, 19);
}

function ts(): string {
  return c("dim", `[${getTimestamp()}]`);
}

function visibleLength(str: string): number {
  return str.replace(ANSI_REGEX, "").length;
}

/**
 * Wraps text to fit terminal width with proper continuation indentation.
 */
function wrapText(
  text: string,
  firstLinePrefix: string,
  continuationIndent: string,
): string {
  const termWidth = process.stdout.columns || 120;
  const firstLineMax = termWidth - visibleLength(firstLinePrefix);
  const continuationMax = termWidth - visibleLength(continuationIndent);

  if (text.length <= firstLineMax) {
    return text;
  }

  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";
  let isFirstLine = true;

  for (const word of words) {
    const maxWidth = isFirstLine ? firstLineMax : continuationMax;
    const testLine = currentLine ? `${currentLine} ${word}` : word;

    if (testLine.length > maxWidth && currentLine) {
      lines.push(currentLine);
      currentLine = word;
      isFirstLine = false;
    } else {
      currentLine = testLine;
    }
  }

  if (currentLine) {
    lines.push(currentLine);
  }

  return lines
    .map((line, i) => (i === 0 ? line : `\n${continuationIndent}${line}`))
    .join("");
}

function clearLine(): void {
  process.stdout.write("\r");
  process.stdout.write(" ".repeat(process.stdout.columns || 120));
  process.stdout.write("\r");
}

// Dynamic ellipsis animation (interactive terminals only)
let ellipsisTimer: NodeJS.Timeout | null = null;
let ellipsisActive = false;

const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

function startEllipsis(message: string): void {
  if (ellipsisActive || silent() || !process.stdout.isTTY) return;
  ellipsisActive = true;

  process.stdout.write(HIDE_CURSOR);
  const frames = ["   ", ".  ", ".. ", "..."];
  let frame = 0;

  ellipsisTimer = setInterval(() => {
    const line = `${ts()} ${c("gray", message)}${frames[frame]}`;
    process.stdout.write(`\r${line}   `);
    frame = (frame + 1) % frames.length;
  }, 350);
  ellipsisTimer.unref();
}

function stopEllipsis(): void {
  if (!ellipsisActive) return;

  if (ellipsisTimer) {
    clearInterval(ellipsisTimer);
    ellipsisTimer = null;
  }

  ellipsisActive = false;
  clearLine();
  process.stdout.write(SHOW_CURSOR);
}

// Hierarchical logging
function logIndentedDetails(details: Details): void {
  const baseIndent = " ".repeat(visibleLength(ts()) + 3);

  const keys = Object.keys(details);
  keys.forEach((key, index) => {
    const isLast = index === keys.length - 1;
    const prefix = isLast ? "└─" : "├─";

    const labelPrefix = `${baseIndent}${prefix} ${key}: `;
    const continuationIndent = " ".repeat(visibleLength(labelPrefix));

    const wrappedValue = wrapText(
      String(details[key]),
      labelPrefix,
      continuationIndent,
    );

    out(
      `${baseIndent}${c("gray", prefix)} ${c("white", key)}: ${c("gray", wrappedValue)}`,
    );
  });
}

// Logger API
export const logger = {
  startup(components: string[], mode: string, executionPermitted: boolean): void {
    stopEllipsis();
    out(cb("white", "healgate"));
    out(c("white", "Reliability decision and safety gateway"));
    out();
    out(
      `  ${c("white", "Components")} : ${cb("white", components.length ? `[ ${components.map((name) => `'${name}'`).join(", ")} ]` : "(any)")}`,
    );
    out(
      `  ${c("white", "Mode")}       : ${cb("white", mode.charAt(0) + mode.slice(1).toLowerCase())}`,
    );
    out(
      `  ${c("white", "Execution")}  : ${cb(executionPermitted ? "yellow" : "white", executionPermitted ? "Permitted" : "Advisory only")}`,
    );
  },

  listening(): void {
    stopEllipsis();
    out();
    startEllipsis("Waiting for telemetry");
  },

  result(success: boolean, message: string, details?: Details): void {
    stopEllipsis();
    const icon = success ? ICONS.success : ICONS.failure;
    const color: ColorName = success ? "green" : "red";
    out(`${ts()} ${c(color, icon)} ${c("white", message)}`);
    if (details) logIndentedDetails(details);
  },

  warn(message: string, details?: Details): void {
    stopEllipsis();
    out(`${ts()} ${c("yellow", ICONS.warning)} ${c("white", message)}`);
    if (details) logIndentedDetails(details);
  },

  info(message: string): void {
    stopEllipsis();
    out(`${ts()} ${c("gray", message)}`);
  },

  rejected(field: string, reason: string): void {
    logger.warn("Telemetry rejected", { Field: field, Reason: reason });
  },

  classified(component: string, classification: Classification): void {
    stopEllipsis();
    const color = LEVEL_COLORS[classification.level];
    out(
      `${ts()} ${c(color, "●")} ${c("white", component)} ${cb(color, classification.level)} ${c("dim", `score=${classification.score.toFixed(3)}`)}`,
    );
    if (classification.affectedMetrics.length > 0) {
      logIndentedDetails(
        Object.fromEntries(
          classification.affectedMetrics.map((m) => [
            m.metric,
            `${m.score.toFixed(2)} (${m.source})`,
          ]),
        ),
      );
    }
  },

  recalled(incidents: readonly RecalledIncident[]): void {
    if (incidents.length === 0) return;
    logger.info(
      `Recalled ${incidents.length} similar incident(s): ${incidents.map((r) => `${r.incident.incidentId} (${r.similarity.toFixed(2)})`).join(", ")}`,
    );
  },

  intent(intent: HealingIntent): void {
    stopEllipsis();
    out(
      `${ts()} ${c("magenta", "Intent:")} ${c("white", intent.tool)} ${c("dim", `→ ${intent.component}`)}`,
    );
    logIndentedDetails({
      Id: intent.intentId,
      Policy: intent.policy,
      Confidence: intent.confidence.toFixed(2),
      Justification: intent.justification,
    });
  },

  gateway(intent: HealingIntent, response: GatewayResponse): void {
    const details: Details = { Tool: intent.tool, Component: intent.component };
    if (response.reason) details.Reason = response.reason;
    if (response.approvalId) details.Approval = response.approvalId;
    if (response.duplicate) details.Duplicate = true;

    switch (response.status) {
      case "COMPLETED":
        logger.result(true, "Action completed", details);
        break;
      case "FAILED":
        logger.result(false, "Action failed", details);
        break;
      case "DENIED":
        logger.warn("Action denied", details);
        break;
      case "PENDING_APPROVAL":
        stopEllipsis();
        out(`${ts()} ${c("cyan", ICONS.pending)} ${cb("white", "Approval Required")}`);
        logIndentedDetails(details);
        break;
      case "ADVISORY_ONLY":
        stopEllipsis();
        out(`${ts()} ${c("cyan", ICONS.success)} ${c("white", "Advisory: would execute")}`);
        logIndentedDetails(details);
        break;
    }
  },

  shutdown(): void {
    stopEllipsis();
    out();
    out(`${ts()} ${c("gray", "Shutting down healgate")}`);
  },
};
