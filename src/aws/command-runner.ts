import { type ChildProcess, type StdioOptions, spawn } from "node:child_process";
import os from "node:os";
import { debug } from "../utils/log.js";

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type RunOptions = {
  /**
   * Attach the child to the terminal so it can prompt or open a browser.
   * Its stdout is sent to our stderr; nothing is captured.
   */
  interactive?: boolean;
};

export type CommandRunner = {
  run(argv: string[], options?: RunOptions): Promise<CommandResult>;
};

const SPAWN_FAILURE_EXIT_CODE = 127;

const liveChildren = new Set<ChildProcess>();
let cleanupInstalled = false;

export function liveChildCount() {
  return liveChildren.size;
}

export function killLiveChildren(signal: NodeJS.Signals = "SIGTERM") {
  for (const child of liveChildren) {
    child.kill(signal);
  }
}

/**
 * Forwards a terminating signal to live children, then raises it again so
 * this process ends the way it would have without the listener.
 */
export function onTerminationSignal(
  signal: NodeJS.Signals,
  reraise: (signal: NodeJS.Signals) => void = (received) => {
    process.kill(process.pid, received);
  }
) {
  killLiveChildren(signal);
  reraise(signal);
}

function installCleanup() {
  if (cleanupInstalled) {
    return;
  }
  cleanupInstalled = true;
  process.once("exit", () => killLiveChildren());
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => onTerminationSignal(signal));
  }
}

export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null) {
  if (code !== null) {
    return code;
  }
  // Shell convention for a child terminated by a signal.
  return signal ? 128 + signalNumber(signal) : 1;
}

const signalNumbers = new Map<string, number>(
  Object.entries(os.constants.signals)
);

function signalNumber(signal: NodeJS.Signals) {
  return signalNumbers.get(signal) ?? 0;
}

export function stdioFor(interactive: boolean): StdioOptions {
  return interactive ? ["inherit", 2, "inherit"] : ["ignore", "pipe", "pipe"];
}

/**
 * Runs commands without a shell. Children still running when this process
 * exits or is interrupted are killed with it.
 */
export class SpawnCommandRunner implements CommandRunner {
  run(argv: string[], options?: RunOptions): Promise<CommandResult> {
    const [command, ...args] = argv;
    if (!command) {
      return Promise.reject(new Error("Cannot run an empty command."));
    }
    installCleanup();
    debug(`Running: ${argv.join(" ")}`);
    const interactive = options?.interactive ?? false;

    return new Promise((resolve) => {
      const child = spawn(command, args, { stdio: stdioFor(interactive) });
      liveChildren.add(child);

      let stdout = "";
      let stderr = "";
      child.stdout?.setEncoding("utf8");
      child.stderr?.setEncoding("utf8");
      child.stdout?.on("data", (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.once("error", (err) => {
        liveChildren.delete(child);
        resolve({
          exitCode: SPAWN_FAILURE_EXIT_CODE,
          stdout,
          stderr: `Failed to run ${command}: ${err.message}`,
        });
      });

      child.once("close", (code, signal) => {
        liveChildren.delete(child);
        resolve({ exitCode: exitCodeOf(code, signal), stdout, stderr });
      });
    });
  }
}
