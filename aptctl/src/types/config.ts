/** Configuration types for the layered config system (base.yaml ← env yaml ← env vars ← flags). */
export type IndexMode = "template" | "scan";

export type PackageConfig = {
  name: string;
  version: string;
  /** Defaults to `{name}-{version}.deb`. */
  filename?: string;
  maintainer?: string;
  description?: string;
  section?: string;
  priority?: string;
  /** Staged tree handed to the build tool. */
  source_dir: string;
  /** Prebuilt `.deb` to ingest into the pool when the build is skipped. */
  artifact?: string;
};

export type DistributionConfig = {
  /** Names the `dists/<codename>` directory and the Release `Codename:`. */
  codename: string;
  suite: string;
  component: string;
  architectures: string[];
  origin?: string;
  label?: string;
  description?: string;
};

export type IndexConfig = {
  packages_mode: IndexMode;
  release_mode: IndexMode;
};

export type ToolsConfig = {
  build: string[];
  scan: string[];
  release: string[];
  gpg: string;
  timeout_seconds: number;
};

export type SigningConfig = {
  key_id: string;
  gpg_homedir?: string;
};

export type PublishConfig = {
  destination: string;
  owner: string;
  use_sudo: boolean;
};

export type AptctlConfig = {
  schema_version: string;
  package: PackageConfig;
  output_dir: string;
  templates_dir: string;
  distribution: DistributionConfig;
  index: IndexConfig;
  tools: ToolsConfig;
  signing: SigningConfig;
  publish: PublishConfig;
};

/** Run toggles; each one has exactly one effect. */
export type PublishToggles = {
  /** false: skip the package build, the artifact must already exist. */
  build: boolean;
  /** false: skip the whole publishing stage. */
  install: boolean;
  /** false: enter publishing but copy nothing into the destination. */
  copy: boolean;
  /** true: do not ask before publishing. */
  autoConfirm: boolean;
};
