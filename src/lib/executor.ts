import { spawn } from "node:child_process";

export type ExecOptions = {
  /** Return the result instead of throwing on a non-zero exit. */
  allowNonZeroExit?: boolean;
};

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export interface Executor {
  run(cmd: string[], options?: ExecOptions): Promise<ExecResult>;
}

/** Non-zero exit of a command run without `allowNonZeroExit`. */
export class CommandError extends Error {
  constructor(readonly cmd: string[], readonly result: ExecResult) {
    const detail = result.stderr.trim();
    super(`Command failed (${result.code}): ${cmd.join(" ")}${detail ? `\n${detail}` : ""}`);
    this.name = "CommandError";
  }
}

export class NodeExecutor implements Executor {
  async run(cmd: string[], options: ExecOptions = {}): Promise<ExecResult> {
    const [file, ...args] = cmd;
    if (!file) throw new Error("Empty command");

    const proc = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"] });

    const stdoutChunks: string[] = [];
    const stderrChunks: string[] = [];
    proc.stdout.setEncoding("utf8");
    proc.stdout.on("data", (text: string) => stdoutChunks.push(text));
    proc.stderr.setEncoding("utf8");
    proc.stderr.on("data", (text: string) => stderrChunks.push(text));

    const code = await new Promise<number>((resolve, reject) => {
      proc.once("error", reject);
      proc.once("close", (exitCode: number | null) => resolve(exitCode ?? 1));
    });

    const result: ExecResult = {
      code,
      stdout: stdoutChunks.join(""),
      stderr: stderrChunks.join(""),
    };

    if (result.code !== 0 && !options.allowNonZeroExit) {
      throw new CommandError(cmd, result);
    }

    return result;
  }
}

export type RecordedCall = { cmd: string[]; options?: ExecOptions; result?: ExecResult };

export type Responder = (cmd: string[]) => ExecResult | Promise<ExecResult>;

export class RecordingExecutor implements Executor {
  public calls: RecordedCall[] = [];
  constructor(private responses: Responder | ExecResult = { code: 0, stdout: "", stderr: "" }) {}
  async run(cmd: string[], options?: ExecOptions): Promise<ExecResult> {
    const res = typeof this.responses === "function" ? await this.responses(cmd) : this.responses;
    const copy: ExecResult = { code: res.code, stdout: res.stdout, stderr: res.stderr };
    this.calls.push({ cmd: [...cmd], options, result: copy });
    if (copy.code !== 0 && !(options?.allowNonZeroExit)) {
      throw new CommandError(cmd, copy);
    }
    return copy;
  }
}
