import { CaptureStream, CommandRunner } from "./talosctl";

export interface RecordedCall {
  args: string[];
  capture: CaptureStream;
}

// In-process stand-in for talosctl: records every argv and replays queued outputs.
export class FakeTalosctl implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly outputs: Array<string | Error> = [];

  constructor(private readonly fallback = "") { }

  respond(...outputs: Array<string | Error>): this {
    this.outputs.push(...outputs);
    return this;
  }

  async run(args: string[], capture: CaptureStream = "stdout"): Promise<string> {
    this.calls.push({ args, capture });
    const next = this.outputs.shift() ?? this.fallback;
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  get argv(): string[][] {
    return this.calls.map((call) => call.args);
  }
}
