import { mkdir, open, readFile, rename } from "node:fs/promises";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

import { ConfigError, SiteConflictError, SiteNotFoundError, SiteValidationError } from "../errors.js";
import { AsyncMutex } from "../infra/mutex.js";
import type { StructuredLogger } from "../logger.js";
import { errnoCode } from "../nodePrimitives.js";
import { PathResolutionError, isDirectory, resolveWithin } from "../paths.js";
import type { AuthOverrides } from "../config/settings.js";
import {
  SiteDescriptorSchema,
  SupervisorConfigSchema,
  toConfigRecord,
  type AuthConfig,
  type SiteDescriptor,
  type SiteDescriptorInput,
  type SupervisorConfig,
} from "./descriptor.js";

/**
 * Read side of the site catalogue consumed by the supervisor and the watchdog.
 * Implementations must hand out complete snapshots: a reader never observes a
 * half-applied edit.
 */
export interface SiteRegistry {
  list(): readonly SiteDescriptor[];
  get(name: string): SiteDescriptor | undefined;
}

/** Write side used by the API layer. */
export interface MutableSiteRegistry extends SiteRegistry {
  add(input: SiteDescriptorInput): Promise<SiteDescriptor>;
  remove(name: string): Promise<SiteDescriptor>;
  reload(): Promise<void>;
  auth(): AuthConfig;
}

const DEFAULT_CONFIG = { sites: [], auth: { username: "admin", password: "password" } };

interface ConfigSiteRegistryOptions {
  /** Credentials taking precedence over the file's `auth` block. */
  readonly authOverrides?: AuthOverrides;
  readonly logger?: StructuredLogger;
}

/**
 * Registry backed by the JSON configuration file. The file is created with
 * defaults when missing and rewritten atomically (temp file, `.bak` copy of
 * the previous version, rename) on every mutation.
 */
export class ConfigSiteRegistry implements MutableSiteRegistry {
  private sites: readonly SiteDescriptor[] = [];
  private fileAuth: AuthConfig = {};
  private readonly writes = new AsyncMutex();

  private constructor(
    readonly configPath: string,
    private readonly options: ConfigSiteRegistryOptions,
  ) {}

  static async open(configPath: string, options: ConfigSiteRegistryOptions = {}): Promise<ConfigSiteRegistry> {
    const registry = new ConfigSiteRegistry(path.resolve(configPath), options);
    await registry.reload();
    return registry;
  }

  list(): readonly SiteDescriptor[] {
    return this.sites;
  }

  get(name: string): SiteDescriptor | undefined {
    return this.sites.find((site) => site.name === name);
  }

  auth(): AuthConfig {
    return { ...this.fileAuth, ...this.options.authOverrides };
  }

  async reload(): Promise<void> {
    await this.writes.runExclusive(async () => {
      const config = await this.readConfig();
      this.apply(config);
      this.options.logger?.info("config_loaded", {
        path: this.configPath,
        sites: config.sites.map((site) => site.name),
      });
      for (const site of config.sites) {
        if (!(await isDirectory(site.cwd))) {
          this.options.logger?.warn("site_cwd_missing", { site: site.name, cwd: site.cwd });
        }
      }
    });
  }

  /**
   * Validates and persists a new site. `cwd` must already exist and `log`
   * must resolve inside it.
   */
  async add(input: SiteDescriptorInput): Promise<SiteDescriptor> {
    const site = parseSite(input);
    if (!(await isDirectory(site.cwd))) {
      throw new SiteValidationError("cwd", `directory does not exist: ${site.cwd}`);
    }
    try {
      resolveWithin(site.cwd, site.log);
    } catch (error) {
      if (error instanceof PathResolutionError) {
        throw new SiteValidationError("log", "must be a file path inside cwd");
      }
      throw error;
    }

    return this.writes.runExclusive(async () => {
      const config = await this.readConfig();
      if (config.sites.some((existing) => existing.name === site.name)) {
        throw new SiteConflictError(site.name);
      }
      const next: SupervisorConfig = { ...config, sites: [...config.sites, site] };
      await this.writeConfig(next);
      this.apply(next);
      this.options.logger?.info("site_added", { site: site.name, cwd: site.cwd });
      return site;
    });
  }

  async remove(name: string): Promise<SiteDescriptor> {
    return this.writes.runExclusive(async () => {
      const config = await this.readConfig();
      const site = config.sites.find((existing) => existing.name === name);
      if (!site) {
        throw new SiteNotFoundError(name);
      }
      const next: SupervisorConfig = {
        ...config,
        sites: config.sites.filter((existing) => existing.name !== name),
      };
      await this.writeConfig(next);
      this.apply(next);
      this.options.logger?.info("site_removed", { site: name });
      return site;
    });
  }

  private apply(config: SupervisorConfig): void {
    this.sites = Object.freeze([...config.sites]);
    this.fileAuth = config.auth;
  }

  private async readConfig(): Promise<SupervisorConfig> {
    let raw: string;
    try {
      raw = await readFile(this.configPath, "utf8");
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        throw new ConfigError(this.configPath, error);
      }
      await mkdir(path.dirname(this.configPath), { recursive: true });
      await this.writeRaw(DEFAULT_CONFIG);
      this.options.logger?.info("config_created", { path: this.configPath });
      raw = JSON.stringify(DEFAULT_CONFIG);
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(this.configPath, error);
    }

    const parsed = SupervisorConfigSchema.safeParse(parsedJson);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigError(this.configPath, `${issue?.path.join(".") || "root"}: ${issue?.message ?? "invalid"}`);
    }

    const names = new Set<string>();
    for (const site of parsed.data.sites) {
      if (names.has(site.name)) {
        throw new ConfigError(this.configPath, `duplicate site name '${site.name}'`);
      }
      names.add(site.name);
    }
    return parsed.data;
  }

  private async writeConfig(config: SupervisorConfig): Promise<void> {
    await this.writeRaw({ sites: config.sites.map(toConfigRecord), auth: config.auth });
  }

  private async writeRaw(payload: unknown): Promise<void> {
    const tmpPath = `${this.configPath}.tmp`;
    const backupPath = `${this.configPath}.bak`;
    try {
      const handle = await open(tmpPath, "w");
      try {
        await handle.writeFile(`${JSON.stringify(payload, null, 2)}\n`, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      try {
        await rename(this.configPath, backupPath);
      } catch (error) {
        if (errnoCode(error) !== "ENOENT") {
          throw error;
        }
      }
      await rename(tmpPath, this.configPath);
    } catch (error) {
      throw new ConfigError(this.configPath, error);
    }
  }
}

/** Validates a descriptor, reporting the first offending field. */
export function parseSite(input: SiteDescriptorInput): SiteDescriptor {
  const parsed = SiteDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SiteValidationError(String(issue?.path[0] ?? "site"), issue?.message ?? "invalid value");
  }
  return parsed.data;
}
