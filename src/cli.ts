// Command-line argument parsing

import type { CliOverrides } from './config.js';
import type { OutputFormat } from './print-mode.js';
import { PermissionModeSchema } from './scenario.js';
import type { ScreenSize } from './tui/render.js';

export interface CliArgs {
  help: boolean;
  version: boolean;
  scenarioSchema: boolean;
  scenarioPath: string | null;
  print: boolean;
  prompt: string | null;
  outputFormat: OutputFormat;
  scriptPath: string | null;
  size: ScreenSize;
  debugFile: string | null;
  overrides: CliOverrides;
}

/**
 * Bad command line. Reported without a stack trace.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const DEFAULT_SCREEN_SIZE: ScreenSize = { width: 80, height: 24 };

/** Parse "COLSxROWS" */
export function parseSize(value: string): ScreenSize {
  const match = /^(\d+)x(\d+)$/.exec(value);
  if (!match) {
    throw new UsageError(`--size expects COLSxROWS, got "${value}"`);
  }
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (width < 20 || height < 5) {
    throw new UsageError(`--size ${value} is too small (minimum 20x5)`);
  }
  return { width, height };
}

/**
 * Parse argv (without node and script path)
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = {
    help: false,
    version: false,
    scenarioSchema: false,
    scenarioPath: null,
    print: false,
    prompt: null,
    outputFormat: 'text',
    scriptPath: null,
    size: DEFAULT_SCREEN_SIZE,
    debugFile: null,
    overrides: {},
  };
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = (): string => {
      const next = args[i + 1];
      if (next === undefined) {
        throw new UsageError(`${arg} needs a value`);
      }
      i++;
      return next;
    };

    switch (arg) {
      case '-h':
      case '--help':
        parsed.help = true;
        break;
      case '-v':
      case '--version':
        parsed.version = true;
        break;
      case '--scenario-schema':
        parsed.scenarioSchema = true;
        break;
      case '--scenario':
        parsed.scenarioPath = value();
        break;
      case '-p':
      case '--print':
        parsed.print = true;
        break;
      case '--output-format': {
        const format = value();
        if (format !== 'text' && format !== 'json') {
          throw new UsageError(`--output-format must be text or json, got "${format}"`);
        }
        parsed.outputFormat = format;
        break;
      }
      case '--model':
        parsed.overrides.model = value();
        break;
      case '--permission-mode': {
        const mode = PermissionModeSchema.safeParse(value());
        if (!mode.success) {
          throw new UsageError(`--permission-mode must be one of ${PermissionModeSchema.options.join(', ')}`);
        }
        parsed.overrides.permissionMode = mode.data;
        break;
      }
      case '--dangerously-skip-permissions':
        parsed.overrides.skipPermissions = true;
        break;
      case '--allow-dangerously-skip-permissions':
        parsed.overrides.allowSkipPermissions = true;
        break;
      case '--script':
        parsed.scriptPath = value();
        break;
      case '--size':
        parsed.size = parseSize(value());
        break;
      case '--debug-file':
        parsed.debugFile = value();
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new UsageError(`Unknown option ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (positional.length > 0) {
    parsed.prompt = positional.join(' ');
  }
  return parsed;
}
