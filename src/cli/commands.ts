import { RULE_WIDTH } from "../config.js";
import { TodoList } from "../todo/list.js";
import type { TodoItem } from "../todo/item.js";
import { DueDateSchema } from "../types/index.js";
import type { Command } from "./args.js";
import { colors, type Output } from "./output.js";

export interface RunOptions {
  /** Path of the JSON store */
  storePath: string;
  output: Output;
}

function notFound(out: Output, id: number): void {
  out.log(colors(out.color).red(`Error: Item with ID ${id} not found.`));
}

function printBlock(out: Output, heading: string, items: readonly TodoItem[]): void {
  const c = colors(out.color);
  const rule = c.dim("=".repeat(RULE_WIDTH));
  out.log(`\n${c.bold(heading)}`);
  out.log(rule);
  for (const item of items) {
    out.log(item.toString());
  }
  out.log(rule);
}

function execute(command: Exclude<Command, { kind: "help" }>, list: TodoList, out: Output): void {
  const c = colors(out.color);

  switch (command.kind) {
    case "add": {
      if (command.dueDate !== undefined && !DueDateSchema.safeParse(command.dueDate).success) {
        out.log(c.red("Error: Invalid date format. Please use YYYY-MM-DD."));
        return;
      }
      const item = list.add(command.title, command.description, command.dueDate, command.priority);
      out.log(c.green(`Added new todo item (ID: ${item.id}): ${item.title}`));
      return;
    }

    case "list": {
      const items = list.list(command.all);
      if (items.length === 0) {
        out.log("No todo items found.");
        return;
      }
      printBlock(out, "To-Do List:", items);
      return;
    }

    case "complete":
      if (list.complete(command.id)) {
        out.log(c.green(`Marked item ${command.id} as completed.`));
      } else {
        notFound(out, command.id);
      }
      return;

    case "remove":
      if (list.remove(command.id)) {
        out.log(c.green(`Removed item with ID ${command.id}.`));
      } else {
        notFound(out, command.id);
      }
      return;

    case "view": {
      const item = list.get(command.id);
      if (!item) {
        notFound(out, command.id);
        return;
      }
      printBlock(out, "Todo Item Details:", [item]);
      return;
    }
  }
}

/**
 * Run a parsed command against the store. Failures (including store I/O
 * errors) are printed, never thrown.
 */
export function runCommand(command: Exclude<Command, { kind: "help" }>, options: RunOptions): void {
  const { output } = options;
  try {
    const list = new TodoList(options.storePath);
    execute(command, list, output);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    output.log(colors(output.color).red(`An error occurred: ${message}`));
  }
}

export function help(out: Output): void {
  const c = colors(out.color);
  out.log(`${c.bold("todo")} - Personal task tracker

${c.bold("Usage:")} todo <command> [options]

${c.bold("Commands:")}
  ${c.cyan("add")} <title>       Add a new todo item
  ${c.cyan("list")}              List incomplete items
  ${c.cyan("complete")} <id>     Mark an item as completed
  ${c.cyan("remove")} <id>       Remove a todo item
  ${c.cyan("view")} <id>         View details of a specific item

${c.bold("Options:")}
  ${c.cyan("--description, -d")} Description of the item (add)
  ${c.cyan("--due_date, --due")} Due date as YYYY-MM-DD (add)
  ${c.cyan("--priority, -p")}    Priority 1: High, 2: Medium, 3: Low (add, default 3)
  ${c.cyan("--all, -a")}         Include completed items (list)

${c.bold("Examples:")}
  ${c.dim("$")} todo add "Buy milk" --priority 1
  ${c.dim("$")} todo add "Pay rent" --due 2026-11-01 -d "Transfer before noon"
  ${c.dim("$")} todo list --all
  ${c.dim("$")} todo complete 1
  ${c.dim("$")} todo view 2
`);
}
