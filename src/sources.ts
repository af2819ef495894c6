import { join } from "node:path";
import type { InstallerEnv } from "./schema.js";

export type InstallMode = "local" | "remote";

export interface ArtifactSpec {
  name: string;
  relativePath: string;
  role: "entrypoint" | "library";
}

export type RemoteSource = {
  kind: "remote";
  url: string;
};

export type LocalSource = {
  kind: "local";
  path: string;
};

export type Source = RemoteSource | LocalSource;

export const UPSTREAM_HOST = "https://raw.githubusercontent.com";
export const UPSTREAM_REPO = "containers/ramalama";
export const DEFAULT_BRANCH = "s";

const LIBRARY_MODULES = [
  "cli.py",
  "config.py",
  "rag.py",
  "gguf_parser.py",
  "huggingface.py",
  "model.py",
  "model_factory.py",
  "model_inspect.py",
  "ollama.py",
  "common.py",
  "__init__.py",
  "quadlet.py",
  "kube.py",
  "oci.py",
  "version.py",
  "shortnames.py",
  "toml_parser.py",
  "file.py",
  "http_client.py",
  "url.py",
  "annotations.py",
  "gpu_detector.py",
  "console.py",
] as const;

/** Entry point first, then the library modules it imports. */
export const ARTIFACTS: readonly ArtifactSpec[] = Object.freeze([
  { name: "ramalama", relativePath: "bin/ramalama", role: "entrypoint" },
  ...LIBRARY_MODULES.map(
    (name): ArtifactSpec => ({
      name,
      relativePath: `ramalama/${name}`,
      role: "library",
    }),
  ),
]);

export function resolveBranch(env: Pick<InstallerEnv, "BRANCH">): string {
  return env.BRANCH ?? DEFAULT_BRANCH;
}

export function resolveSource(
  artifact: ArtifactSpec,
  mode: InstallMode,
  branch: string,
  sourceRoot: string,
): Source {
  if (mode === "local") {
    return { kind: "local", path: join(sourceRoot, artifact.relativePath) };
  }
  return {
    kind: "remote",
    url: `${UPSTREAM_HOST}/${UPSTREAM_REPO}/${branch}/${artifact.relativePath}`,
  };
}

export function describeSource(source: Source): string {
  return source.kind === "local" ? source.path : source.url;
}
