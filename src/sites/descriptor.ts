import { z } from "zod";

/** Site names double as session names and pid-file names. */
export const SITE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** Log file used when a site does not name one. */
export const DEFAULT_SITE_LOG = "activity.log";

/**
 * A user-defined process the supervisor manages. Descriptors are immutable:
 * the registry replaces them wholesale and the supervisor never mutates them.
 */
export interface SiteDescriptor {
  readonly name: string;
  /** Working directory the command runs in. */
  readonly cwd: string;
  /** Shell command line. */
  readonly cmd: string;
  /** Display-only port number. */
  readonly port: number | null;
  /** Log path, relative to {@link cwd}. */
  readonly log: string;
  /** Start once when the supervisor boots. */
  readonly autostart: boolean;
  /** Restart whenever the watchdog observes the site stopped. */
  readonly autorestart: boolean;
}

export const SiteNameSchema = z
  .string()
  .min(1, "name is required")
  .max(64, "name must not exceed 64 characters")
  .regex(SITE_NAME_PATTERN, "name may only contain letters, digits, '_' and '-'");

/**
 * Shape of one entry of the `sites` array in the configuration file. Loose
 * inputs (missing flags, `port` as a numeric string, an empty log) are
 * normalised so hand-edited files keep loading.
 */
export const SiteDescriptorSchema = z
  .object({
    name: SiteNameSchema,
    cwd: z.string().min(1, "cwd is required"),
    cmd: z.string().trim().min(1, "cmd cannot be empty"),
    port: z.coerce.number().int().positive().max(65_535).nullable().optional(),
    log: z.string().trim().optional(),
    autostart: z.boolean().optional(),
    autorestart: z.boolean().optional(),
  })
  .transform(
    (raw): SiteDescriptor => ({
      name: raw.name,
      cwd: raw.cwd,
      cmd: raw.cmd,
      port: raw.port ?? null,
      log: raw.log && raw.log.length > 0 ? raw.log : DEFAULT_SITE_LOG,
      autostart: raw.autostart ?? false,
      autorestart: raw.autorestart ?? false,
    }),
  );

/** Input accepted when registering a new site. */
export type SiteDescriptorInput = z.input<typeof SiteDescriptorSchema>;

/** Credentials protecting the HTTP API. */
export interface AuthConfig {
  readonly username?: string;
  readonly password?: string;
  readonly token?: string;
}

export const AuthConfigSchema = z
  .object({
    username: z.string().optional(),
    password: z.string().optional(),
    token: z.string().optional(),
  })
  .default({});

/** Whole configuration file. */
export const SupervisorConfigSchema = z.object({
  sites: z.array(SiteDescriptorSchema).default([]),
  auth: AuthConfigSchema,
});

export type SupervisorConfig = z.output<typeof SupervisorConfigSchema>;

/** Serialisable form written back to disk. */
export function toConfigRecord(site: SiteDescriptor): Record<string, unknown> {
  return {
    name: site.name,
    cwd: site.cwd,
    cmd: site.cmd,
    port: site.port,
    log: site.log,
    autostart: site.autostart,
    autorestart: site.autorestart,
  };
}
