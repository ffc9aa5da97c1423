import { PrioritySchema, DEFAULT_PRIORITY, type Priority } from "../types/index.js";

export type Command =
  | {
      kind: "add";
      title: string;
      description: string;
      dueDate: string | undefined;
      priority: Priority;
    }
  | { kind: "list"; all: boolean }
  | { kind: "complete" | "remove" | "view"; id: number }
  | { kind: "help" };

/** Invocation rejected before any command runs */
export interface UsageError {
  kind: "usage-error";
  message: string;
}

export type CommandName = Exclude<Command["kind"], "help">;

interface OptionSpec {
  key: string;
  names: string[];
  takesValue: boolean;
}

const ADD_OPTIONS: OptionSpec[] = [
  { key: "description", names: ["-d", "--description"], takesValue: true },
  { key: "due_date", names: ["-due", "--due", "--due_date"], takesValue: true },
  { key: "priority", names: ["-p", "--priority"], takesValue: true },
];

const LIST_OPTIONS: OptionSpec[] = [
  { key: "all", names: ["-a", "--all"], takesValue: false },
];

const COMMANDS: readonly CommandName[] = ["add", "list", "complete", "remove", "view"];

interface Scanned {
  positionals: string[];
  options: Map<string, string | true>;
}

function usageError(message: string): UsageError {
  return { kind: "usage-error", message };
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((name) => name === value);
}

/**
 * Split arguments into positionals and known options.
 * Accepts `--flag value` and `--flag=value`; a bare negative number is
 * a positional.
 */
function scan(args: string[], known: OptionSpec[]): Scanned | UsageError {
  const positionals: string[] = [];
  const options = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (!arg.startsWith("-") || arg === "-" || /^-\d+$/.test(arg)) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const option = known.find((s) => s.names.includes(name));
    if (!option) {
      return usageError(`Unknown option: ${name}`);
    }

    if (!option.takesValue) {
      if (eq !== -1) return usageError(`Option ${name} does not take a value`);
      options.set(option.key, true);
      continue;
    }

    if (eq !== -1) {
      options.set(option.key, arg.slice(eq + 1));
      continue;
    }

    const value = args[i + 1];
    if (value === undefined) {
      return usageError(`Option ${name} expects a value`);
    }
    options.set(option.key, value);
    i++;
  }

  return { positionals, options };
}

function parseId(command: CommandName, positionals: string[]): number | UsageError {
  const [raw, ...extra] = positionals;
  if (raw === undefined) {
    return usageError(`Missing item id for ${command}`);
  }
  if (extra.length > 0) {
    return usageError(`Unexpected arguments: ${extra.join(" ")}`);
  }
  if (!/^-?\d+$/.test(raw)) {
    return usageError(`Invalid item id: ${raw}`);
  }
  return Number(raw);
}

function parseAdd(args: string[]): Command | UsageError {
  const scanned = scan(args, ADD_OPTIONS);
  if ("kind" in scanned) return scanned;

  const [title, ...extra] = scanned.positionals;
  if (title === undefined || title.trim() === "") {
    return usageError("Missing title for add");
  }
  if (extra.length > 0) {
    return usageError(`Unexpected arguments: ${extra.join(" ")}`);
  }

  const text = (key: string): string | undefined => {
    const value = scanned.options.get(key);
    return typeof value === "string" ? value : undefined;
  };

  let priority: Priority = DEFAULT_PRIORITY;
  const rawPriority = text("priority");
  if (rawPriority !== undefined) {
    const parsed = PrioritySchema.safeParse(/^\d+$/.test(rawPriority) ? Number(rawPriority) : rawPriority);
    if (!parsed.success) {
      return usageError(`Invalid priority: ${rawPriority} (choose from 1, 2, 3)`);
    }
    priority = parsed.data;
  }

  return {
    kind: "add",
    title,
    description: text("description") ?? "",
    // An empty value means no due date
    dueDate: text("due_date") || undefined,
    priority,
  };
}

/**
 * Turn `argv` (without the node and script entries) into a command.
 */
export function parseArgs(argv: string[]): Command | UsageError {
  const [command, ...rest] = argv;

  if (command === undefined || command === "--help" || command === "-h") {
    return { kind: "help" };
  }
  if (!isCommandName(command)) {
    return usageError(`Unknown command: ${command}`);
  }

  switch (command) {
    case "add":
      return parseAdd(rest);
    case "list": {
      const scanned = scan(rest, LIST_OPTIONS);
      if ("kind" in scanned) return scanned;
      if (scanned.positionals.length > 0) {
        return usageError(`Unexpected arguments: ${scanned.positionals.join(" ")}`);
      }
      return { kind: "list", all: scanned.options.has("all") };
    }
    case "complete":
    case "remove":
    case "view": {
      const scanned = scan(rest, []);
      if ("kind" in scanned) return scanned;
      const id = parseId(command, scanned.positionals);
      if (typeof id !== "number") return id;
      return { kind: command, id };
    }
  }
}
