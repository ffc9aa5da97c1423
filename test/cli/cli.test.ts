import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { spawn } from "node:child_process";
import { mkdir, rm, readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const CLI_PATH = join(__dirname, "../../src/cli/index.ts");

/**
 * Integration tests that run the CLI through tsx in a scratch directory
 * and check exit codes, stdout and the store file.
 */

interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
}

async function runCli(args: string[], cwd: string): Promise<ExecResult> {
  const tsxPath = join(__dirname, "../../node_modules/.bin/tsx");
  return new Promise((resolve) => {
    const proc = spawn(tsxPath, [CLI_PATH, ...args], {
      cwd,
      env: { ...process.env, NO_COLOR: "1", TODO_DEBUG: "" },
      shell: false,
    });

    let stdout = "";
    let stderr = "";

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("close", (code) => {
      resolve({ code: code ?? 0, stdout, stderr });
    });
  });
}

describe("CLI", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `todo-cli-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("help", () => {
    it("shows usage when no command is given", async () => {
      const result = await runCli([], testDir);

      expect(result.code).toBe(0);
      expect(result.stdout).toContain("Usage: todo <command> [options]");
    });

    it("exits 1 on an unknown command", async () => {
      const result = await runCli(["archive"], testDir);

      expect(result.code).toBe(1);
      expect(result.stdout).toContain("Unknown command: archive");
      expect(existsSync(join(testDir, "todo_data.json"))).toBe(false);
    });
  });

  describe("commands", () => {
    it("adds an item to todo_data.json in the working directory", async () => {
      const result = await runCli(["add", "Buy milk", "--priority", "1"], testDir);

      expect(result.code).toBe(0);
      expect(result.stdout).toBe("Added new todo item (ID: 1): Buy milk\n");

      const store = JSON.parse(await readFile(join(testDir, "todo_data.json"), "utf-8"));
      expect(store).toEqual({
        todos: [
          {
            id: 1,
            title: "Buy milk",
            description: "",
            due_date: null,
            priority: 1,
            completed: false,
          },
        ],
        next_id: 2,
      });
    });

    it("keeps state across invocations", async () => {
      await runCli(["add", "Buy milk"], testDir);
      await runCli(["add", "Clean house"], testDir);
      await runCli(["complete", "1"], testDir);

      const result = await runCli(["list"], testDir);

      expect(result.stdout).toBe(
        [
          "",
          "To-Do List:",
          "=".repeat(50),
          "2. [✗] Clean house | Priority: Low",
          "   ",
          "=".repeat(50),
          "",
        ].join("\n")
      );
    });

    it("exits 0 when the due date is invalid", async () => {
      const result = await runCli(["add", "Pay rent", "--due", "2026-13-01"], testDir);

      expect(result.code).toBe(0);
      expect(result.stdout).toBe("Error: Invalid date format. Please use YYYY-MM-DD.\n");
      expect(existsSync(join(testDir, "todo_data.json"))).toBe(false);
    });

    it("exits 0 when the id is not found", async () => {
      const result = await runCli(["view", "4"], testDir);

      expect(result.code).toBe(0);
      expect(result.stdout).toBe("Error: Item with ID 4 not found.\n");
    });
  });
});
