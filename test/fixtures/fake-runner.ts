import type {
  CommandResult,
  CommandRunner,
  RunOptions,
} from "../../src/aws/command-runner.js";

export type RecordedCall = {
  argv: string[];
  options?: RunOptions;
};

type Responder = (argv: string[]) => Partial<CommandResult> | undefined;

/**
 * Answers commands by their leading words, e.g. `"sts get-caller-identity"`.
 * Unmatched commands exit 0 with no output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly responders = new Map<string, Responder>();

  on(prefix: string, response: Partial<CommandResult> | Responder) {
    this.responders.set(
      prefix,
      typeof response === "function" ? response : () => response
    );
    return this;
  }

  run(argv: string[], options?: RunOptions): Promise<CommandResult> {
    this.calls.push({ argv, options });
    const line = argv.slice(1).join(" ");
    for (const [prefix, responder] of this.responders) {
      if (line.startsWith(prefix)) {
        const response = responder(argv) ?? {};
        return Promise.resolve({
          exitCode: response.exitCode ?? 0,
          stdout: response.stdout ?? "",
          stderr: response.stderr ?? "",
        });
      }
    }
    return Promise.resolve({ exitCode: 0, stdout: "", stderr: "" });
  }

  callsTo(prefix: string) {
    return this.calls.filter((call) =>
      call.argv.slice(1).join(" ").startsWith(prefix)
    );
  }
}
