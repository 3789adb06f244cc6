import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_PORT } from "./gerrit.js";
import type { RemoteInfo } from "./git.js";
import type { ConnectionConfig, Label, LabelSet } from "./types.js";

export const CONFIG_FILE = "revline.config.yaml";

const LabelSchema = z.object({
  name: z.string().min(1),
  short: z.string().min(1).max(2),
  // scores render in two-column cells
  approved: z.number().int().positive().max(9),
  rejected: z.number().int().negative().min(-9),
});

export const DEFAULT_LABELS: LabelSet = Object.freeze([
  Object.freeze({ name: "Code-Review", short: "CR", approved: 2, rejected: -2 }),
  Object.freeze({ name: "Verified", short: "VR", approved: 1, rejected: -1 }),
]);

const SshSchema = z.object({
  host_and_user: z.string().optional(),
  port: z.number().int().positive().optional(),
});

const ConfigSchema = z.object({
  version: z.number().optional().default(1),
  remote: z.string().default("origin"),
  project: z.string().optional(),
  ssh: SshSchema.optional().transform((v) => SshSchema.parse(v ?? {})),
  filter: z.string().optional(),
  extra_options: z.string().optional(),
  labels: z
    .array(LabelSchema)
    .min(1)
    .optional()
    .transform((v): Label[] => v ?? [...DEFAULT_LABELS]),
});

export type RevlineConfig = z.infer<typeof ConfigSchema>;

const EnvSchema = z.object({
  GERRIT_SSH_CREDS: z.string().optional(),
  GERRIT_SSH_PORT: z.coerce.number().int().positive().optional(),
  GERRIT_PROJECT: z.string().optional(),
  GERRIT_REMOTE: z.string().optional(),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

export function parseConfig(raw: unknown): RevlineConfig {
  const parsed = ConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`invalid ${CONFIG_FILE}: ${describeIssues(parsed.error)}`);
  }
  if (parsed.data.version > 1) {
    throw new ConfigurationError(
      `config version ${parsed.data.version} requires a newer version of revline. run \`npm install -g revline\` to upgrade.`,
    );
  }
  return parsed.data;
}

/** Reads revline.config.yaml from the cwd; a missing file means all defaults. */
export function loadConfig(configPath?: string): RevlineConfig {
  const p = configPath || resolve(process.cwd(), CONFIG_FILE);
  if (!existsSync(p)) {
    if (configPath) throw new ConfigurationError(`config not found at ${p}`);
    return parseConfig({});
  }
  return parseConfig(parseYaml(readFileSync(p, "utf-8")));
}

export function loadEnvConfig(envPath?: string): EnvConfig {
  loadEnv({ path: envPath || resolve(process.cwd(), ".env") });
  const parsed = EnvSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid environment: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export interface Settings {
  readonly connection: ConnectionConfig;
  readonly project: string;
  readonly remote: string;
  readonly labels: LabelSet;
  readonly filter?: string;
  readonly extraOptions?: string;
}

export interface SettingsOverrides {
  project?: string;
  hostAndUser?: string;
  port?: number;
  filter?: string;
  extraOptions?: string;
}

/** Remote name to read credentials from: env beats the config file. */
export function remoteName(config: RevlineConfig, env: EnvConfig): string {
  return env.GERRIT_REMOTE || config.remote;
}

/**
 * Merges flags, environment, config file and the git remote, in that order of
 * precedence. Missing credentials are left unset here; the gerrit client
 * reports them when a command is about to run.
 */
export function resolveSettings(
  config: RevlineConfig,
  env: EnvConfig,
  remote: RemoteInfo | null,
  overrides: SettingsOverrides = {},
): Settings {
  const connection: ConnectionConfig = Object.freeze({
    hostAndUser: overrides.hostAndUser || env.GERRIT_SSH_CREDS || config.ssh.host_and_user || remote?.hostAndUser,
    port: overrides.port ?? env.GERRIT_SSH_PORT ?? config.ssh.port ?? remote?.port ?? DEFAULT_PORT,
  });

  return Object.freeze({
    connection,
    project: overrides.project || env.GERRIT_PROJECT || config.project || remote?.project || "",
    remote: remoteName(config, env),
    labels: Object.freeze(config.labels.map((l) => Object.freeze({ ...l }))),
    filter: overrides.filter || config.filter,
    extraOptions: overrides.extraOptions || config.extra_options,
  });
}

export function findLabel(labels: LabelSet, name: string): Label | undefined {
  return labels.find((l) => l.name.toLowerCase() === name.toLowerCase() || l.short.toLowerCase() === name.toLowerCase());
}
