/**
 * Configuration file management for gitsem
 *
 * Reads the global ~/.gitsem/config.json and the project-level
 * .gitsem/config.json. Project config overrides global config, and
 * command-line flags override both.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { z } from "zod";
import { ConfigError } from "../types/errors";

export const CONFIG_DIR = ".gitsem";
export const CONFIG_FILE = "config.json";

// Global config directory in user's home
const GLOBAL_CONFIG_DIR = join(homedir(), CONFIG_DIR);

const configSchema = z
  .object({
    commit: z
      .object({
        autoStageAll: z.boolean().optional(),
      })
      .strict()
      .optional(),
    release: z
      .object({
        remote: z.string().min(1).optional(),
        tagPrefix: z.string().optional(),
        autoPush: z.boolean().optional(),
      })
      .strict()
      .optional(),
    general: z
      .object({
        verbose: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Shape of a config.json file; every key is optional
 */
export type GitsemConfigFile = z.infer<typeof configSchema>;

/**
 * Config after defaults have been applied
 */
export interface GitsemConfig {
  commit: {
    /** Stage all changes before committing when no files are given */
    autoStageAll: boolean;
  };
  release: {
    remote: string;
    tagPrefix: string;
    /** Push new tags without passing --push */
    autoPush: boolean;
  };
  general: {
    /** Echo every git command before running it */
    verbose: boolean;
  };
}

export const DEFAULT_CONFIG: GitsemConfig = {
  commit: {
    autoStageAll: false,
  },
  release: {
    remote: "origin",
    tagPrefix: "v",
    autoPush: false,
  },
  general: {
    verbose: false,
  },
};

export interface ConfigLocations {
  /** Repository root, or null outside a repository */
  repoRoot: string | null;
  /** Overrides ~/.gitsem */
  globalDir?: string;
}

/**
 * Merge a config file over resolved config, section by section
 */
function mergeConfig(base: GitsemConfig, override: GitsemConfigFile): GitsemConfig {
  return {
    commit: { ...base.commit, ...override.commit },
    release: { ...base.release, ...override.release },
    general: { ...base.general, ...override.general },
  };
}

export function getGlobalConfigPath(globalDir: string = GLOBAL_CONFIG_DIR): string {
  return join(globalDir, CONFIG_FILE);
}

export function getProjectConfigPath(repoRoot: string): string {
  return join(repoRoot, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Read and validate one config file. Returns null if it doesn't exist.
 *
 * @throws ConfigError when the file is not valid JSON or has unknown keys
 */
export function readConfigFile(path: string): GitsemConfigFile | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`${path}: ${reason}`);
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`${path}: ${issues}`);
  }

  return parsed.data;
}

/**
 * Get the config with layered loading:
 * 1. Start with defaults
 * 2. Merge global ~/.gitsem/config.json (if exists)
 * 3. Merge project .gitsem/config.json (if exists)
 */
export function getConfig(locations: ConfigLocations): GitsemConfig {
  let config = DEFAULT_CONFIG;

  const globalConfig = readConfigFile(getGlobalConfigPath(locations.globalDir));
  if (globalConfig) {
    config = mergeConfig(config, globalConfig);
  }

  if (locations.repoRoot) {
    const projectConfig = readConfigFile(getProjectConfigPath(locations.repoRoot));
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  return config;
}

/**
 * Write the default config to a project, unless one already exists.
 * Returns the path and whether it was created.
 */
export function initProjectConfig(repoRoot: string): { path: string; created: boolean } {
  const path = getProjectConfigPath(repoRoot);

  if (existsSync(path)) {
    return { path, created: false };
  }

  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n", "utf-8");
  return { path, created: true };
}
