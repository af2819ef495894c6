import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { createRuntimeContext, parseEnv, splitSearchPath } from "./context.js";
import { InstallerError, InstallerErrorCode } from "./errors.js";

describe("parseEnv", () => {
  it("treats an empty BRANCH as unset", () => {
    const env = parseEnv({ BRANCH: "", PATH: "/usr/bin" });
    assert.equal(env.BRANCH, undefined);
    assert.equal(env.PATH, "/usr/bin");
  });

  it("defaults PATH to an empty string", () => {
    assert.equal(parseEnv({}).PATH, "");
  });

  it("accepts branch names with slashes", () => {
    assert.equal(parseEnv({ BRANCH: "feature/x" }).BRANCH, "feature/x");
  });

  it("rejects a branch that climbs out of the repository", () => {
    assert.throws(
      () => parseEnv({ BRANCH: "../etc" }),
      (err: unknown) =>
        err instanceof InstallerError &&
        err.code === InstallerErrorCode.INVALID_CONFIG &&
        err.exitCode === 7 &&
        err.message.includes("BRANCH: Must not contain '..'"),
    );
  });

  it("rejects a branch with whitespace", () => {
    assert.throws(() => parseEnv({ BRANCH: "my branch" }), /Must be a git branch or tag name/);
  });
});

describe("splitSearchPath", () => {
  it("drops empty entries", () => {
    assert.deepEqual(splitSearchPath("/usr/bin::/bin:"), ["/usr/bin", "/bin"]);
  });
});

describe("createRuntimeContext", () => {
  it("records a branch override", () => {
    const ctx = createRuntimeContext({ PATH: "/a:/b", BRANCH: "main" });
    assert.equal(ctx.branch, "main");
    assert.equal(ctx.branchOverridden, true);
    assert.deepEqual(ctx.searchPath, ["/a", "/b"]);
    assert.ok(Object.isFrozen(ctx));
  });

  it("falls back to the stable branch", () => {
    const ctx = createRuntimeContext({ PATH: "/usr/bin" });
    assert.equal(ctx.branch, "s");
    assert.equal(ctx.branchOverridden, false);
  });
});
