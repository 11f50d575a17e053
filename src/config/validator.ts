import { loadAjv } from "../schema/ajv.js";
import type { InstallerConfig } from "../types/config.js";

const PACKAGE_SCHEMA = {
  type: "object",
  required: ["release_api", "release_kind", "download_url", "archive", "source_dir", "build_system", "configure_flags"],
  additionalProperties: false,
  properties: {
    release_api: { type: "string", format: "uri" },
    release_kind: { type: "string", enum: ["latest_release", "tags"] },
    download_url: { type: "string", pattern: "^https?://.*\\{version\\}" },
    archive: { type: "string", minLength: 1 },
    source_dir: { type: "string", minLength: 1 },
    build_system: { type: "string", enum: ["cmake", "autotools"] },
    configure_flags: { type: "array", items: { type: "string" } },
  },
};

export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "work_dir", "log_file", "pin_file", "apt_sources", "required_tools", "build_packages", "packages"],
  additionalProperties: false,
  properties: {
    schema_version: { type: "string", minLength: 1 },
    work_dir: { type: "string", minLength: 1 },
    log_file: { type: "string", minLength: 1 },
    pin_file: { type: "string", minLength: 1 },
    apt_sources: { type: "string", minLength: 1 },
    installer_update_url: { type: "string", format: "uri" },
    required_tools: { type: "array", items: { type: "string", minLength: 1 } },
    build_packages: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
    packages: {
      type: "object",
      required: ["aom", "libheif", "imagemagick"],
      additionalProperties: false,
      properties: {
        aom: PACKAGE_SCHEMA,
        libheif: PACKAGE_SCHEMA,
        imagemagick: PACKAGE_SCHEMA,
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: InstallerConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile<InstallerConfig>(CONFIG_SCHEMA);
  if (validate(raw)) {
    return { valid: true, config: raw, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
