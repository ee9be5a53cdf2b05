import { spawn } from "node:child_process";
import * as readline from "node:readline";
import { ProcessError } from "../errors.js";

export interface ToolProcessHandlers {
  /** One non-empty line of stdout */
  onLine(line: string): void;
  /** Called once, when the process is gone or could not start */
  onExit(error: ProcessError): void;
}

export interface ToolProcess {
  readonly pid: number | undefined;
  send(line: string): void;
  /** End stdin, then SIGTERM (and SIGKILL) if the process outlives the grace period */
  stop(graceMs: number): Promise<void>;
}

export type SpawnTool = (handlers: ToolProcessHandlers) => ToolProcess;

export interface ToolCommand {
  command: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  /** Unwritten stdin bytes tolerated before the process counts as stalled and is killed */
  maxStdinBacklogBytes?: number;
}

export const DEFAULT_STDIN_BACKLOG_BYTES = 16 * 1024 * 1024;

export function childToolProcess(cmd: ToolCommand): SpawnTool {
  const maxBacklog = cmd.maxStdinBacklogBytes ?? DEFAULT_STDIN_BACKLOG_BYTES;
  return (handlers) => {
    const child = spawn(cmd.command, cmd.args, { env: cmd.env ?? process.env });
    let exited = false;

    const gone = new Promise<void>((resolve) => {
      const report = (error: ProcessError): void => {
        if (exited) return;
        exited = true;
        resolve();
        handlers.onExit(error);
      };
      child.on("error", (err) =>
        report(new ProcessError(`Tool process failed: ${err.message}`, {}, { cause: err })),
      );
      // "close" waits for stdout to drain, so no trailing response is lost
      child.on("close", (code, signal) =>
        report(
          new ProcessError(
            `Tool process exited (${signal ? `signal ${signal}` : `code ${code}`})`,
            { exitCode: code, signal },
          ),
        ),
      );
    });

    readline.createInterface({ input: child.stdout }).on("line", (line) => {
      if (line.trim()) handlers.onLine(line);
    });
    readline.createInterface({ input: child.stderr }).on("line", (line) => {
      console.error(`[Tool] ${line}`);
    });
    child.stdin.on("error", (err) => {
      console.error(`[Tool] stdin: ${err.message}`);
    });

    return {
      get pid() {
        return child.pid;
      },
      send(line) {
        if (exited || !child.stdin.writable) return;
        child.stdin.write(`${line}\n`);
        // A process that stopped reading counts as dead
        const backlog = child.stdin.writableLength;
        if (backlog > maxBacklog) {
          console.error(
            `[Tool] stdin backlog of ${backlog} bytes exceeds ${maxBacklog}, killing stalled process`,
          );
          child.kill("SIGKILL");
        }
      },
      async stop(graceMs) {
        if (exited) return;
        child.stdin.end();
        const term = setTimeout(() => child.kill("SIGTERM"), graceMs);
        const kill = setTimeout(() => child.kill("SIGKILL"), graceMs * 2);
        await gone;
        clearTimeout(term);
        clearTimeout(kill);
      },
    };
  };
}
