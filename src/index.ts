#!/usr/bin/env node

// Main entry point
// Loads the scenario, then runs print mode, a headless script or the interactive TUI

import fs from 'node:fs';
import { type CliArgs, parseCliArgs, UsageError } from './cli.js';
import { resolveSettings, type SessionSettings } from './config.js';
import { loadScript, runScript } from './headless.js';
import { createDebugLogWriter, type DebugLogWriter, resolveDebugLogPath } from './logger.js';
import { runPrintMode } from './print-mode.js';
import { emptyScenario, loadScenario, type Scenario, scenarioJsonSchema } from './scenario.js';
import { createTUI, type TUI } from './tui/index.js';

/**
 * Get package.json version
 */
function getVersion(): string {
  const pkgPath = new URL('../package.json', import.meta.url);
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

/**
 * Print help message
 */
function printHelp(): void {
  console.log(`
understudy - Scenario-driven stand-in for an interactive AI coding CLI

  Looks and behaves like the real assistant in a terminal, but every
  answer comes from a scenario file, so integration tests get the same
  screens every run, offline and for free.

USAGE
  understudy [options] [prompt]

OPTIONS
  -h, --help                              Show this help message
  -v, --version                           Show version number
  --scenario <file>                       Scenario JSON file
  -p, --print                             Answer one prompt and exit
  --output-format <text|json>             Print mode output format (default text)
  --model <id>                            Model shown in the header
  --permission-mode <mode>                default, acceptEdits, plan or bypassPermissions
  --dangerously-skip-permissions          Start in bypass permissions mode
  --allow-dangerously-skip-permissions    Allow shift+tab to reach bypass mode
  --script <file>                         Run a JSON key script headless, print frames
  --size <COLSxROWS>                      Screen size for --script (default 80x24)
  --debug-file <file>                     Append a debug log to this file
  --scenario-schema                       Print the scenario JSON Schema

ENVIRONMENT
  UNDERSTUDY_EXIT_HINT_TIMEOUT_MS         Double-press window for exit hints
  UNDERSTUDY_RESPONSE_DELAY_MS            Default delay before each response
  UNDERSTUDY_DEBUG_LOG                    Debug log file

EXAMPLES
  understudy --scenario examples/hello.json
  understudy --scenario examples/hello.json -p "hello"
  understudy --scenario examples/hello.json --script examples/shell.keys.json --size 100x30
`);
}

/**
 * Read a print-mode prompt piped on stdin
 */
function readStdinPrompt(): string | null {
  if (process.stdin.isTTY) return null;
  const text = fs.readFileSync(0, 'utf-8').trim();
  return text === '' ? null : text;
}

async function runPrint(args: CliArgs, scenario: Scenario, settings: SessionSettings): Promise<number> {
  const prompt = args.prompt ?? readStdinPrompt();
  if (prompt === null) {
    throw new UsageError('--print needs a prompt argument or piped input');
  }
  const result = await runPrintMode(scenario, settings, prompt, args.outputFormat);
  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  return result.exitCode;
}

function runHeadless(args: CliArgs, scenario: Scenario, settings: SessionSettings, debugLog?: DebugLogWriter): number {
  if (!args.scriptPath) return 1;
  const steps = loadScript(args.scriptPath);
  const result = runScript(scenario, settings, steps, args.size, debugLog);
  const frames = result.frames.length > 0 ? result.frames : [{ name: 'final', grid: result.final }];
  for (const frame of frames) {
    process.stdout.write(`--- ${frame.name} ---\n${frame.grid.toText()}\n`);
  }
  return 0;
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  let tui: TUI | null = null;
  let isShuttingDown = false;

  function shutdown(exitCode: number = 0): void {
    // Prevent multiple shutdown calls
    if (isShuttingDown) return;
    isShuttingDown = true;

    if (tui) {
      tui.stop();
    }
    process.exit(exitCode);
  }

  // Ctrl+C arrives as a key in raw mode; SIGTERM is the only signal that ends us
  process.on('SIGTERM', () => {
    shutdown(0);
  });

  try {
    const args = parseCliArgs(process.argv.slice(2));

    if (args.help) {
      printHelp();
      return;
    }
    if (args.version) {
      console.log(getVersion());
      return;
    }
    if (args.scenarioSchema) {
      console.log(JSON.stringify(scenarioJsonSchema(), null, 2));
      return;
    }

    const scenario = args.scenarioPath ? loadScenario(args.scenarioPath) : emptyScenario();
    const settings = resolveSettings(scenario, getVersion(), args.overrides);
    const logPath = resolveDebugLogPath(args.debugFile);
    const debugLog = logPath ? createDebugLogWriter(logPath) : undefined;

    if (args.print) {
      process.exitCode = await runPrint(args, scenario, settings);
      return;
    }
    if (args.scriptPath) {
      process.exitCode = runHeadless(args, scenario, settings, debugLog);
      return;
    }
    if (args.prompt !== null) {
      throw new UsageError('A prompt argument needs --print');
    }
    if (!process.stdin.isTTY || !process.stdout.isTTY) {
      throw new UsageError('Interactive mode needs a terminal; use --print or --script');
    }

    tui = createTUI(scenario, settings, { onDebugLog: debugLog });
    tui.onExit(() => {
      shutdown(0);
    });
    tui.start();
  } catch (error) {
    if (tui) {
      tui.stop();
    }
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }
}

// Self-executing entry point
void main();
