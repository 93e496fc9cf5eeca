/**
 * CLI configuration: flags, then environment, then defaults.
 * Validated with Zod before anything touches the terminal.
 */

import { parseArgs } from 'node:util';
import { homedir } from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const USAGE = `Usage: sshpick [options]

Pick a host from an SSH config file and connect to it.

Options:
  -c, --config <path>   SSH config file (env SSHPICK_CONFIG, default ~/.ssh/config)
      --ssh <binary>    ssh client to run (env SSHPICK_SSH_BINARY, default ssh)
  -f, --filter <text>   Only list hosts whose name, hostname or user contains text
      --dump            Print the parsed hosts and exit
      --debug           Enable debug logging (env SSHPICK_DEBUG)
  -h, --help            Show this help
`;

/** Invalid flags or values. The CLI exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Raw configuration before path expansion and defaults. */
export const RawCliConfigSchema = z
  .object({
    configPath: z.string().min(1, 'config path must not be empty').optional(),
    sshBinary: z.string().min(1, 'ssh binary must not be empty').optional(),
    filter: z.string().optional(),
    dump: z.boolean().default(false),
    debug: z.boolean().default(false),
    help: z.boolean().default(false),
  })
  .strip();

export type RawCliConfig = z.input<typeof RawCliConfigSchema>;

export interface CliConfig {
  configPath: string;
  sshBinary: string;
  filter?: string;
  dump: boolean;
  debug: boolean;
  help: boolean;
}

export interface ConfigSources {
  argv: string[];
  env: Record<string, string | undefined>;
  homeDir?: string;
}

/** Expand a leading `~` to the home directory. */
export function expandHome(filePath: string, homeDir: string): string {
  if (filePath === '~') return homeDir;
  if (filePath.startsWith('~/')) return path.join(homeDir, filePath.slice(2));
  return filePath;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === 'true' || value === '1';
}

function readFlags(argv: string[]): RawCliConfig {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        config: { type: 'string', short: 'c' },
        ssh: { type: 'string' },
        filter: { type: 'string', short: 'f' },
        dump: { type: 'boolean' },
        debug: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
      },
      strict: true,
      allowPositionals: false,
    });
    return {
      configPath: values.config,
      sshBinary: values.ssh,
      filter: values.filter,
      dump: values.dump,
      debug: values.debug,
      help: values.help,
    };
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

function readEnv(env: Record<string, string | undefined>): RawCliConfig {
  return {
    configPath: env.SSHPICK_CONFIG || undefined,
    sshBinary: env.SSHPICK_SSH_BINARY || undefined,
    debug: parseBooleanEnv(env.SSHPICK_DEBUG),
  };
}

/** Merge two raw configs; defined values in `override` win. */
function merge(base: RawCliConfig, override: RawCliConfig): RawCliConfig {
  const result: RawCliConfig = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

export function loadCliConfig({ argv, env, homeDir = homedir() }: ConfigSources): CliConfig {
  const merged = merge(readEnv(env), readFlags(argv));
  const parsed = RawCliConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join(', '));
  }

  const raw = parsed.data;
  return {
    configPath: expandHome(raw.configPath ?? path.join(homeDir, '.ssh', 'config'), homeDir),
    sshBinary: raw.sshBinary ?? 'ssh',
    filter: raw.filter,
    dump: raw.dump,
    debug: raw.debug,
    help: raw.help,
  };
}
