import { tmpdir } from "node:os";
import type { RuntimeContext } from "./context.js";
import type { CommandResult, CommandRunner, Probe } from "./exec.js";
import type { HttpResponse, HttpTransport } from "./fetch.js";

/** Records every command; `fails` decides which command lines exit 1. */
export class FakeRunner implements CommandRunner {
  readonly calls: string[][] = [];

  constructor(private readonly fails: (commandLine: string) => boolean = () => false) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    const line = [command, ...args];
    this.calls.push(line);
    const ok = !this.fails(line.join(" "));
    return { ok, code: ok ? 0 : 1 };
  }

  commands(): string[] {
    return this.calls.map((call) => call.join(" "));
  }
}

export class FakeProbe implements Probe {
  private readonly present: Set<string>;

  constructor(present: Iterable<string> = []) {
    this.present = new Set(present);
  }

  async available(name: string): Promise<boolean> {
    return this.present.has(name);
  }
}

type Reply = HttpResponse | Error;

/** Answers each request from `reply`; an Error reply rejects like a dropped connection. */
export class FakeTransport implements HttpTransport {
  readonly urls: string[] = [];

  constructor(private readonly reply: (url: string, n: number) => Reply) {}

  async get(url: string): Promise<HttpResponse> {
    this.urls.push(url);
    const result = this.reply(url, this.urls.length);
    if (result instanceof Error) throw result;
    return result;
  }
}

export function ok(body: string, extra: Partial<HttpResponse> = {}): HttpResponse {
  return { status: 200, data: Buffer.from(body), ...extra };
}

export function status(code: number, extra: Partial<HttpResponse> = {}): HttpResponse {
  return { status: code, data: Buffer.alloc(0), ...extra };
}

/** Sleep that only moves a fake clock forward. */
export function fakeClock() {
  let time = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => time,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      time += ms;
    },
  };
}

export function makeContext(overrides: Partial<RuntimeContext> = {}): RuntimeContext {
  return {
    osName: "Linux",
    uid: 0,
    searchPath: ["/usr/local/bin", "/usr/bin", "/bin"],
    branch: "s",
    branchOverridden: false,
    kernelCmdline: "",
    sourceRoot: "/nonexistent/source",
    tmpRoot: tmpdir(),
    ...overrides,
  };
}
