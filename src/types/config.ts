/** Layered config: base.yaml, then <env>.yaml, then IM7_* variables. */
export const PACKAGE_NAMES = ["aom", "libheif", "imagemagick"] as const;

export type PackageName = (typeof PACKAGE_NAMES)[number];

/** `latest_release` reads `tag_name` from a release object, `tags` reads `name` from the first tag. */
export type ReleaseKind = "latest_release" | "tags";

export type BuildSystem = "cmake" | "autotools";

export type SourcePackageConfig = {
  release_api: string;
  release_kind: ReleaseKind;
  /** URL template; `{version}` is substituted. */
  download_url: string;
  archive: string;
  source_dir: string;
  build_system: BuildSystem;
  configure_flags: string[];
};

export type InstallerConfig = {
  schema_version: string;
  work_dir: string;
  log_file: string;
  pin_file: string;
  apt_sources: string;
  installer_update_url?: string;
  required_tools: string[];
  build_packages: string[];
  packages: Record<PackageName, SourcePackageConfig>;
};

export type ResolvedVersions = Record<PackageName, string>;

/** Environment handed to every subprocess instead of mutating process.env. */
export type BuildEnv = {
  DEBIAN_FRONTEND: "noninteractive";
  MAKEFLAGS: string;
};

/** Resolved run parameters. Built once after version resolution; frozen thereafter. */
export type InstallConfig = Readonly<{
  versions: Readonly<ResolvedVersions>;
  ci: boolean;
  workDir: string;
  logFile: string;
  pinFile: string;
  cores: number;
  env: Readonly<BuildEnv>;
}>;
