import { spawn, SpawnOptions } from "child_process";
import { EventEmitter } from "events";
import { Readable } from "stream";
import { ServerConfig } from "../config";
import { ConfigurationMissingError, ExternalToolError, SpawnError, toError } from "../errors";

// Health checks print their report on stderr; everything else on stdout.
export type CaptureStream = "stdout" | "stderr";

export interface CommandRunner {
  run(args: string[], capture?: CaptureStream): Promise<string>;
}

export interface ChildProcessLike extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcessLike;

// Runs talosctl against the configured talosconfig and resolves with the captured stream.
export class TalosctlRunner implements CommandRunner {
  constructor(
    private readonly config: ServerConfig,
    private readonly spawnProcess: SpawnFn = spawn,
  ) { }

  run(args: string[], capture: CaptureStream = "stdout"): Promise<string> {
    const talosconfig = this.config.talosconfig;
    if (!talosconfig) {
      return Promise.reject(new ConfigurationMissingError("TALOSCONFIG"));
    }

    const command = this.config.talosctlPath;
    const argv = ["--talosconfig", talosconfig, ...args];

    return new Promise((resolve, reject) => {
      let child: ChildProcessLike;
      try {
        child = this.spawnProcess(command, argv, { env: process.env, stdio: ["ignore", "pipe", "pipe"] });
      } catch (err) {
        reject(new SpawnError("talosctl", toError(err)));
        return;
      }

      let stdout = "";
      let stderr = "";

      child.stdout?.on("data", (data: Buffer | string) => {
        stdout += data.toString();
      });

      child.stderr?.on("data", (data: Buffer | string) => {
        stderr += data.toString();
      });

      child.on("error", (err: Error) => {
        reject(new SpawnError("talosctl", err));
      });

      child.on("close", (code: number | null) => {
        if (code !== 0) {
          reject(new ExternalToolError("talosctl", stderr, code));
          return;
        }
        resolve(capture === "stderr" ? stderr : stdout);
      });
    });
  }
}
