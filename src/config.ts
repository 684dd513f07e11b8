import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_DEBUG_FILE,
  DEFAULT_FILTER_COMMAND,
  DEFAULT_LIST_COMMAND,
  DEFAULT_MANIFEST_COMMAND,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_QUEUE_TIMEOUT_MS,
  DEFAULT_RENDERER_COMMAND,
  DEFAULT_TITLE,
  MAX_BATCH_SIZE,
} from "./types/constants.js";
import { ConfigError, getErrorMessage } from "./errors.js";
import { parseCommand, type CommandSpec } from "./system/exec.js";

/**
 * Options as commander hands them over. Negatable flags (`--no-filter`)
 * arrive as `false`, values as strings.
 */
export interface CliOptions {
  output?: string;
  debugFile?: string | false;
  batchSize?: string;
  queueTimeout?: string;
  limit?: string;
  title?: string;
  listCommand?: string;
  manifestCommand?: string;
  renderer?: string;
  filter?: string | false;
  progress?: boolean;
  yes?: boolean;
  verbose?: boolean;
}

export interface RunConfig {
  outputPath: string;
  debugFile: string | null;
  batchSize: number;
  queueTimeoutMs: number;
  limit?: number;
  title: string;
  listCommand: CommandSpec;
  manifestCommand: CommandSpec;
  renderer: CommandSpec;
  filter: CommandSpec | null;
  progress: boolean;
  assumeYes: boolean;
  verbose: boolean;
}

export function parseBooleanFlag(
  value: unknown,
  name: string,
): boolean | undefined {
  if (value === undefined || value === null || value === "") {
    return undefined;
  }

  if (typeof value === "boolean") {
    return value;
  }

  if (typeof value === "string") {
    const normalized = value.toLowerCase();
    if (["true", "1", "yes", "y"].includes(normalized)) {
      return true;
    }
    if (["false", "0", "no", "n"].includes(normalized)) {
      return false;
    }
  }

  throw new ConfigError(`${name} must be true or false`);
}

export function parsePositiveInt(
  value: string | undefined,
  name: string,
  fallback: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  if (value === undefined) {
    return fallback;
  }
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  if (parsed > max) {
    throw new ConfigError(`${name} must be at most ${max}, got ${parsed}`);
  }
  return parsed;
}

function commandOption(value: string | undefined, name: string, fallback: string): CommandSpec {
  try {
    return parseCommand(value ?? fallback);
  } catch (error) {
    throw new ConfigError(`${name}: ${getErrorMessage(error)}`);
  }
}

export function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const debugFile =
    options.debugFile === false ? null : options.debugFile ?? DEFAULT_DEBUG_FILE;
  const filter =
    options.filter === false
      ? null
      : commandOption(options.filter, "--filter", DEFAULT_FILTER_COMMAND);
  const envYes = parseBooleanFlag(env.MANBOOK_YES, "MANBOOK_YES");

  return {
    outputPath: options.output ?? DEFAULT_OUTPUT_FILE,
    debugFile,
    batchSize: parsePositiveInt(
      options.batchSize,
      "--batch-size",
      DEFAULT_BATCH_SIZE,
      MAX_BATCH_SIZE,
    ),
    queueTimeoutMs: parsePositiveInt(
      options.queueTimeout,
      "--queue-timeout",
      DEFAULT_QUEUE_TIMEOUT_MS,
    ),
    limit:
      options.limit === undefined
        ? undefined
        : parsePositiveInt(options.limit, "--limit", 0),
    title: options.title ?? DEFAULT_TITLE,
    listCommand: commandOption(options.listCommand, "--list-command", DEFAULT_LIST_COMMAND),
    manifestCommand: commandOption(
      options.manifestCommand,
      "--manifest-command",
      DEFAULT_MANIFEST_COMMAND,
    ),
    renderer: commandOption(options.renderer, "--renderer", DEFAULT_RENDERER_COMMAND),
    filter,
    progress: options.progress ?? true,
    assumeYes: options.yes === true || envYes === true,
    verbose: options.verbose ?? false,
  };
}
