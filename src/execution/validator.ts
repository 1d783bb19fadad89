/**
 * Command validation for the docker CLI tools.
 * Commands must be a `docker service update`, target exactly one known
 * component and be free of shell injection.
 */

export class CommandValidationError extends Error {
  constructor(
    public command: string,
    public reason: string,
  ) {
    super(reason);
    this.name = "CommandValidationError";
  }
}

/** The only subcommand the CLI tools issue */
const ALLOWED_SUBCOMMANDS: readonly RegExp[] = [/^docker\s+service\s+update\s/];

const BLOCKED_PATTERNS: Array<{ pattern: RegExp; reason: string }> = [
  { pattern: /\bsh\s+-c\b/i, reason: "Shell invocation not allowed" },
  { pattern: /\bbash\s+-c\b/i, reason: "Shell invocation not allowed" },

  { pattern: /\|/, reason: "Pipes not allowed" },
  { pattern: />/, reason: "Output redirection not allowed" },
  { pattern: /</, reason: "Input redirection not allowed" },

  { pattern: /\$\(/, reason: "Command substitution not allowed" },
  { pattern: /`/, reason: "Backtick substitution not allowed" },
  { pattern: /\$\{?[A-Za-z_]/, reason: "Variable expansion not allowed" },

  { pattern: /&/, reason: "Command chaining (&) not allowed" },
  { pattern: /;/, reason: "Command chaining (;) not allowed" },
  { pattern: /[\r\n]/, reason: "Multi-line commands not allowed" },

  // Environment prefixes; flag values such as --label-add k=v stay allowed
  { pattern: /^[A-Za-z_][A-Za-z0-9_]*=/, reason: "Variable assignment not allowed" },

  { pattern: /[()]/, reason: "Subshell not allowed" },
  { pattern: /\s--(privileged|cap-add|mount|volume)\b/, reason: "Privilege escalation flag blocked" },
];

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Hyphens belong to component names, so "api" does not match "api-service".
function mentions(command: string, name: string): boolean {
  return new RegExp(`(?<![\\w-])${escapeRegex(name)}(?![\\w-])`).test(command);
}

export function validateCommand(
  command: string,
  knownTargets: ReadonlySet<string>,
): void {
  const trimmed = command.trim();

  if (!trimmed) {
    throw new CommandValidationError(command, "Empty command not allowed");
  }

  if (!ALLOWED_SUBCOMMANDS.some((pattern) => pattern.test(trimmed))) {
    throw new CommandValidationError(command, "Command is not a permitted docker subcommand");
  }

  for (const { pattern, reason } of BLOCKED_PATTERNS) {
    if (pattern.test(trimmed)) {
      throw new CommandValidationError(command, reason);
    }
  }

  const matches = Array.from(knownTargets).filter((name) => mentions(trimmed, name));

  if (matches.length === 0) {
    throw new CommandValidationError(command, "Command does not reference any known component");
  }
  if (matches.length > 1) {
    throw new CommandValidationError(
      command,
      `Command references multiple components: ${matches.join(", ")}`,
    );
  }
}
