import { describe, it, beforeEach, afterEach, mock } from "node:test";
import assert from "node:assert/strict";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { ARTIFACTS } from "../sources.js";
import { createWorkspace, type Workspace } from "../workspace.js";
import {
  FakeProbe,
  FakeRunner,
  FakeTransport,
  fakeClock,
  makeContext,
  ok,
  status,
} from "../test-helpers.js";
import { runInstaller, type InstallerDeps } from "./install.js";

/** Real temp workspaces, with every dispose() counted. */
class TrackedWorkspaces {
  readonly created: Workspace[] = [];
  disposals = 0;

  factory = async (tmpRoot: string): Promise<Workspace> => {
    const inner = await createWorkspace(tmpRoot);
    this.created.push(inner);
    return {
      path: inner.path,
      get removed() {
        return inner.removed;
      },
      dispose: () => {
        this.disposals++;
        inner.dispose();
      },
    };
  };
}

const unreachable = () =>
  new FakeTransport((url) => new Error(`unexpected request to ${url}`));

describe("runInstaller", () => {
  let root: string;
  let shareRoot: string;
  let binDir: string;
  let logged: string[];
  let errors: string[];
  let workspaces: TrackedWorkspaces;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "installer-run-"));
    shareRoot = join(root, "share");
    binDir = join(root, "bin");
    mkdirSync(shareRoot);
    mkdirSync(binDir);
    mkdirSync(join(root, "tmp"));
    workspaces = new TrackedWorkspaces();
    logged = [];
    errors = [];
    mock.method(console, "log", (...args: unknown[]) => {
      logged.push(args.map(String).join(" "));
    });
    mock.method(console, "error", (...args: unknown[]) => {
      errors.push(args.map(String).join(" "));
    });
  });

  afterEach(async () => {
    mock.restoreAll();
    await Promise.all(workspaces.created.map((w) => w.removed));
    rmSync(root, { recursive: true, force: true });
  });

  function deps(overrides: Partial<InstallerDeps> = {}): Partial<InstallerDeps> {
    return {
      context: makeContext({
        searchPath: [binDir, "/usr/bin"],
        sourceRoot: join(root, "checkout"),
        tmpRoot: join(root, "tmp"),
      }),
      probe: new FakeProbe(),
      runner: new FakeRunner(),
      transport: unreachable(),
      shareDirCandidates: [join(root, "missing-share"), shareRoot],
      binDirCandidates: [join(root, "missing-bin"), binDir],
      createWorkspace: workspaces.factory,
      ...overrides,
    };
  }

  function writeCheckout() {
    for (const artifact of ARTIFACTS) {
      const path = join(root, "checkout", artifact.relativePath);
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, `contents of ${artifact.name}`);
    }
  }

  const libDir = () => join(shareRoot, "ramalama", "ramalama");

  it("prints the shared install directory and does nothing else", async () => {
    const runner = new FakeRunner();
    const code = await runInstaller(
      { args: ["get_sharedir"] },
      deps({ runner }),
    );
    assert.equal(code, 0);
    assert.deepEqual(logged, [join(shareRoot, "ramalama")]);
    assert.deepEqual(runner.calls, []);
    assert.equal(workspaces.created.length, 0);
    assert.equal(existsSync(join(shareRoot, "ramalama")), false);
  });

  it("answers get_* even when BRANCH is invalid", async () => {
    const previous = process.env.BRANCH;
    process.env.BRANCH = "../not-a-branch";
    try {
      const code = await runInstaller(
        { args: ["get_sharedir"] },
        { shareDirCandidates: [shareRoot] },
      );
      assert.equal(code, 0, errors.join("\n"));
      assert.deepEqual(logged, [join(shareRoot, "ramalama")]);
    } finally {
      if (previous === undefined) delete process.env.BRANCH;
      else process.env.BRANCH = previous;
    }
  });

  it("prints nothing for get_* when no shared directory exists", async () => {
    const code = await runInstaller(
      { args: ["get_installation_dir"] },
      deps({ shareDirCandidates: [join(root, "nope")] }),
    );
    assert.equal(code, 0);
    assert.deepEqual(logged, []);
  });

  it("stops after the native package installs", async () => {
    const runner = new FakeRunner();
    const transport = unreachable();
    const code = await runInstaller(
      {},
      deps({
        runner,
        transport,
        probe: new FakeProbe(["dnf"]),
      }),
    );
    assert.equal(code, 0);
    assert.deepEqual(runner.commands(), [
      "dnf install -y podman",
      "dnf install -y python3-ramalama",
    ]);
    assert.equal(transport.urls.length, 0);
    assert.equal(workspaces.created.length, 0);
    assert.equal(existsSync(join(binDir, "ramalama")), false);
  });

  it("installs every file from the local source tree", async () => {
    writeCheckout();
    const runner = new FakeRunner();
    const transport = unreachable();
    const code = await runInstaller(
      { local: true },
      deps({ runner, transport, probe: new FakeProbe(["dnf"]) }),
    );

    assert.equal(code, 0, errors.join("\n"));
    assert.equal(
      readFileSync(join(binDir, "ramalama"), "utf-8"),
      "contents of ramalama",
    );
    for (const artifact of ARTIFACTS.filter((a) => a.role === "library")) {
      assert.equal(
        readFileSync(join(libDir(), artifact.name), "utf-8"),
        `contents of ${artifact.name}`,
      );
    }
    assert.deepEqual(runner.calls, []);
    assert.equal(transport.urls.length, 0);
    assert.equal(workspaces.disposals, 1);
    await workspaces.created[0].removed;
    assert.equal(existsSync(workspaces.created[0].path), false);
  });

  const localHosts: Array<{ title: string; osName: string; uid: number }> = [
    { title: "an unsupported operating system", osName: "FreeBSD", uid: 0 },
    { title: "macOS without brew", osName: "Darwin", uid: 501 },
    { title: "a Linux user without sudo", osName: "Linux", uid: 1000 },
  ];

  for (const host of localHosts) {
    it(`installs from the local source tree on ${host.title}`, async () => {
      writeCheckout();
      const runner = new FakeRunner();
      const code = await runInstaller(
        { local: true },
        deps({
          runner,
          context: makeContext({
            osName: host.osName,
            uid: host.uid,
            searchPath: [binDir],
            sourceRoot: join(root, "checkout"),
            tmpRoot: join(root, "tmp"),
          }),
        }),
      );

      assert.equal(code, 0, errors.join("\n"));
      assert.equal(readFileSync(join(binDir, "ramalama"), "utf-8"), "contents of ramalama");
      assert.equal(readFileSync(join(libDir(), "cli.py"), "utf-8"), "contents of cli.py");
      assert.deepEqual(runner.calls, []);
    });
  }

  it("downloads from the overridden branch instead of using the native package", async () => {
    const runner = new FakeRunner();
    const transport = new FakeTransport((url) => ok(`remote ${url.split("/").pop()}`));
    const ctx = makeContext({
      searchPath: [binDir],
      branch: "v0.5.0",
      branchOverridden: true,
      tmpRoot: join(root, "tmp"),
    });
    const code = await runInstaller(
      {},
      deps({
        context: ctx,
        runner,
        transport,
        probe: new FakeProbe(["dnf", "podman"]),
      }),
    );

    assert.equal(code, 0, errors.join("\n"));
    assert.deepEqual(runner.calls, []);
    assert.equal(transport.urls.length, ARTIFACTS.length);
    assert.equal(
      transport.urls[0],
      "https://raw.githubusercontent.com/containers/ramalama/v0.5.0/bin/ramalama",
    );
    assert.equal(readFileSync(join(binDir, "ramalama"), "utf-8"), "remote ramalama");
    assert.equal(readFileSync(join(libDir(), "oci.py"), "utf-8"), "remote oci.py");
    assert.equal(workspaces.disposals, 1);
  });

  it("falls back to downloading when the native package fails", async () => {
    const runner = new FakeRunner((line) => line.endsWith("python3-ramalama"));
    const transport = new FakeTransport(() => ok("x"));
    const code = await runInstaller(
      {},
      deps({ runner, transport, probe: new FakeProbe(["dnf", "podman"]) }),
    );
    assert.equal(code, 0, errors.join("\n"));
    assert.deepEqual(runner.commands(), ["dnf install -y python3-ramalama"]);
    assert.equal(transport.urls.length, ARTIFACTS.length);
    assert.ok(transport.urls.every((url) => url.includes("/containers/ramalama/s/")));
  });

  it("exits non-zero and removes the workspace when the network stays down", async () => {
    const clock = fakeClock();
    const transport = new FakeTransport(() => new Error("getaddrinfo ENOTFOUND"));
    const code = await runInstaller(
      {},
      deps({
        transport,
        sleep: clock.sleep,
        now: clock.now,
      }),
    );

    assert.equal(code, 1);
    assert.equal(transport.urls.length, 4);
    assert.ok(errors.some((line) => line.includes("after 4 attempts")), errors.join("\n"));
    assert.equal(workspaces.disposals, 1);
    await workspaces.created[0].removed;
    assert.equal(existsSync(workspaces.created[0].path), false);
    assert.equal(existsSync(join(binDir, "ramalama")), false);
  });

  it("places nothing when a library fails to download", async () => {
    const transport = new FakeTransport((url) =>
      url.endsWith("/oci.py") ? status(404) : ok("x"),
    );
    const code = await runInstaller(
      {},
      deps({ transport }),
    );
    assert.equal(code, 1);
    assert.equal(existsSync(join(binDir, "ramalama")), false);
    assert.equal(existsSync(join(shareRoot, "ramalama")), false);
    assert.equal(workspaces.disposals, 1);
  });

  it("exits 5 when no bin directory is on the search path", async () => {
    const code = await runInstaller(
      { local: true },
      deps({
        context: makeContext({ searchPath: ["/nowhere"], tmpRoot: join(root, "tmp") }),
      }),
    );
    assert.equal(code, 5);
    assert.ok(errors.some((line) => line.includes("No suitable bin directory found in PATH")));
    assert.equal(workspaces.created.length, 0);
  });

  it("exits 6 when there is no shared directory", async () => {
    const code = await runInstaller(
      { local: true },
      deps({ shareDirCandidates: [join(root, "nope")] }),
    );
    assert.equal(code, 6);
  });

  it("exits 4 on an unsupported operating system", async () => {
    const code = await runInstaller({}, deps({ context: makeContext({ osName: "SunOS" }) }));
    assert.equal(code, 4);
  });

  it("exits 3 for a Linux user without sudo", async () => {
    const code = await runInstaller({}, deps({ context: makeContext({ uid: 1000 }) }));
    assert.equal(code, 3);
  });

  it("exits 2 on macOS without brew", async () => {
    const code = await runInstaller(
      {},
      deps({ context: makeContext({ osName: "Darwin", uid: 501 }) }),
    );
    assert.equal(code, 2);
  });

  it("shows the plan without changing anything on a dry run", async () => {
    const runner = new FakeRunner();
    const transport = unreachable();
    const code = await runInstaller(
      { dryRun: true },
      deps({ runner, transport, probe: new FakeProbe(["dnf"]) }),
    );
    assert.equal(code, 0);
    assert.deepEqual(runner.calls, []);
    assert.equal(transport.urls.length, 0);
    assert.equal(workspaces.created.length, 0);
    assert.ok(
      logged.some((line) =>
        line.includes("https://raw.githubusercontent.com/containers/ramalama/s/bin/ramalama"),
      ),
    );
  });
});
