import path from 'node:path';
import {
  BROWSER_STRATEGIES,
  EXECUTION_ENVS,
  type BrowserConfig,
  type ConfigOverrides,
} from '../config/pipeline-config.js';
import { EventHub } from '../api/websocket-hub.js';
import { DEFAULT_PORT, startControlServer } from '../api/router.js';
import { signPayload } from '../api/shared.js';
import type { ConfirmFn } from '../services/endpoint-provider.js';
import { LifecycleRegistry } from '../services/lifecycle-registry.js';
import { loadLatestSession, summarizeSession } from '../services/session-store.js';
import type { PipelineRunResult } from '../types/pipeline.js';
import { startDashboard } from '../interfaces/tui-dashboard.js';
import { PipelineError, errorMessage } from './errors.js';
import { CallbackSink, JsonLinesSink, PipelineEventEmitter, describeEvent } from './events.js';
import { PipelineController } from './pipeline-controller.js';
import { WatchOrchestrator, type PipelineRunner } from './watch-orchestrator.js';

// ── Help text ────────────────────────────────────────────────────────────────

export const HELP_TEXT = `
Usage: aether <command> [dir] [options]

Commands:
  run [dir]           Run the pipeline once against the current changes
  watch [dir]         Re-run the pipeline whenever files change (until Ctrl+C)
  stop [dir]          Stop the watcher a running 'aether serve' holds for dir
  history [dir]       Show the most recent recorded session
  serve               Start the control API and event stream

Options:
  --strategy <labels>     Comma-separated strategy labels (default: auto)
  --env <kind>            Execution environment: local, docker, k8s
  --browser <strategy>    local, attach, docker, k8s, dry-run, none
  --browser-url <url>     Endpoint to attach to
  --launch-browser        Spawn the browser container or pod
  --headless / --headed   Browser window mode
  --app-url <url>         Base URL visual tests navigate to
  --initial-run           watch: run once before waiting for changes
  --port <n>              serve/stop: control API port (default ${DEFAULT_PORT})
  --json                  Emit events as JSON lines
  --no-tui                watch: plain log output instead of the dashboard
  --help, -h              Show this help message

Examples:
  aether run ./app --strategy frontend,backend
  aether watch ./app --browser attach --browser-url ws://127.0.0.1:9222
  aether run . --env docker --json
  aether history ./app
`.trim();

// ── Argument parsing ─────────────────────────────────────────────────────────

export type CliCommand = 'run' | 'watch' | 'stop' | 'history' | 'serve' | 'help';

const COMMANDS: readonly CliCommand[] = ['run', 'watch', 'stop', 'history', 'serve', 'help'];

export interface CliOptions {
  command: CliCommand;
  targetDir: string;
  overrides: ConfigOverrides;
  json: boolean;
  tui: boolean;
  initialRun: boolean;
  port?: number;
}

export type ParsedCli = { ok: true; options: CliOptions } | { ok: false; error: string };

const VALUE_FLAGS = new Set(['--strategy', '--env', '--browser', '--browser-url', '--app-url', '--port']);

/**
 * Parse `argv` (without the node and script entries) into CLI options.
 * Flags accept both `--flag value` and `--flag=value`.
 */
export function parseCliArgs(argv: string[]): ParsedCli {
  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return { ok: true, options: defaults('help') };
  }

  const command = COMMANDS.find((candidate) => candidate === argv[0]);
  if (!command) {
    return { ok: false, error: `Unknown command: '${argv[0]}'` };
  }

  const options = defaults(command);
  const browser: Partial<Omit<BrowserConfig, 'readiness'>> = {};
  const positionals: string[] = [];

  for (let index = 1; index < argv.length; index++) {
    const arg = argv[index];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    let value: string | undefined;
    if (VALUE_FLAGS.has(flag)) {
      value = eq >= 0 ? arg.slice(eq + 1) : argv[++index];
      if (value === undefined || value === '') {
        return { ok: false, error: `Option '${flag}' requires a value.` };
      }
    } else if (eq >= 0) {
      return { ok: false, error: `Option '${flag}' does not take a value.` };
    }

    switch (flag) {
      case '--strategy':
        options.overrides.strategy = value;
        break;
      case '--env': {
        const env = EXECUTION_ENVS.find((kind) => kind === value);
        if (!env) return { ok: false, error: `--env must be one of: ${EXECUTION_ENVS.join(', ')}.` };
        options.overrides.executionEnv = env;
        break;
      }
      case '--browser': {
        const strategy = BROWSER_STRATEGIES.find((candidate) => candidate === value);
        if (!strategy) return { ok: false, error: `--browser must be one of: ${BROWSER_STRATEGIES.join(', ')}.` };
        browser.strategy = strategy;
        break;
      }
      case '--browser-url':
        browser.url = value;
        break;
      case '--launch-browser':
        browser.launch = true;
        break;
      case '--headless':
        browser.headless = true;
        break;
      case '--headed':
        browser.headless = false;
        break;
      case '--app-url':
        options.overrides.appUrl = value;
        break;
      case '--port': {
        const port = Number(value);
        if (!Number.isInteger(port) || port < 0 || port > 65_535) {
          return { ok: false, error: `--port must be an integer between 0 and 65535.` };
        }
        options.port = port;
        break;
      }
      case '--initial-run':
        options.initialRun = true;
        break;
      case '--json':
        options.json = true;
        break;
      case '--no-tui':
        options.tui = false;
        break;
      default:
        return { ok: false, error: `Unknown option '${flag}'.` };
    }
  }

  if (positionals.length > 1) {
    return { ok: false, error: `Expected at most one directory, got: ${positionals.join(' ')}` };
  }
  if (positionals.length === 1) options.targetDir = positionals[0];
  if (Object.keys(browser).length > 0) options.overrides.browser = browser;
  return { ok: true, options };
}

function defaults(command: CliCommand): CliOptions {
  return { command, targetDir: '.', overrides: {}, json: false, tui: true, initialRun: false };
}

// ── Presentation ─────────────────────────────────────────────────────────────

export function formatRunSummary(result: PipelineRunResult): string {
  const count = (status: string) => result.results.filter((entry) => entry.status === status).length;
  const lines = [
    `Run ${result.outcome}: ${count('PASSED')} passed, ${count('FAILED')} failed, ${count('SKIPPED')} skipped.`,
  ];
  for (const entry of result.results) {
    lines.push(`  ${entry.status.padEnd(7)} ${entry.label}${entry.error ? `: ${entry.error}` : ''}`);
  }
  if (result.sessionPath) lines.push(`Session saved: ${result.sessionPath}`);
  if (result.error) lines.push(`Error: ${result.error}`);
  return lines.join('\n');
}

/** 0 when every test passed (or nothing changed), 1 otherwise. */
export function exitCodeFor(result: PipelineRunResult): number {
  if (result.outcome === 'aborted' || result.outcome === 'cancelled') return 1;
  return result.results.some((entry) => entry.status === 'FAILED') ? 1 : 0;
}

// ── Command handlers ─────────────────────────────────────────────────────────

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  /** Builds the pipeline for a registry; the default is a `PipelineController`. */
  createPipeline?: (registry: LifecycleRegistry, confirm: ConfirmFn | undefined) => PipelineRunner;
  /** Subscribes to Ctrl+C; returns the unsubscribe function. */
  onInterrupt?: (handler: () => void) => () => void;
  interactive?: boolean;
}

const acceptDefault: ConfirmFn = async (_question, defaultAnswer) => defaultAnswer;

function onSigint(handler: () => void): () => void {
  process.on('SIGINT', handler);
  return () => {
    process.off('SIGINT', handler);
  };
}

function createEmitter(options: CliOptions): PipelineEventEmitter {
  const emitter = new PipelineEventEmitter();
  if (options.json) {
    emitter.addSink(new JsonLinesSink());
  } else {
    emitter.addSink(new CallbackSink((event) => {
      console.log(describeEvent(event));
    }));
  }
  return emitter;
}

async function handleRun(options: CliOptions, deps: Required<CliDeps>): Promise<number> {
  const registry = new LifecycleRegistry();
  const pipeline = deps.createPipeline(registry, options.json || !deps.interactive ? acceptDefault : undefined);
  const emitter = createEmitter(options);
  const abort = new AbortController();
  const release = deps.onInterrupt(() => {
    console.error('[Aether] Interrupted; cancelling the run.');
    abort.abort();
  });

  try {
    const result = await pipeline.runPipeline(options.targetDir, {
      invocation: 'cli',
      overrides: options.overrides,
      emitter,
      signal: abort.signal,
      env: deps.env,
    });
    if (!options.json) console.log(formatRunSummary(result));
    return exitCodeFor(result);
  } finally {
    release();
    await registry.stopAll();
  }
}

async function handleWatch(options: CliOptions, deps: Required<CliDeps>): Promise<number> {
  const registry = new LifecycleRegistry();
  // Watch runs are unattended; prompts take their default answer.
  const pipeline = deps.createPipeline(registry, acceptDefault);
  const orchestrator = new WatchOrchestrator(pipeline);

  if (!options.tui || options.json || !deps.interactive) {
    return watchUntilStopped(orchestrator, registry, options, deps, createEmitter(options));
  }

  // The dashboard owns the terminal, so events go to it alone.
  const dashboard = startDashboard({
    targetDir: path.resolve(options.targetDir),
    onQuit: () => {
      void registry.stopAll();
    },
  });
  try {
    return await watchUntilStopped(orchestrator, registry, options, deps, new PipelineEventEmitter([dashboard.sink]));
  } finally {
    dashboard.destroy();
  }
}

async function watchUntilStopped(
  orchestrator: WatchOrchestrator,
  registry: LifecycleRegistry,
  options: CliOptions,
  deps: Required<CliDeps>,
  emitter: PipelineEventEmitter,
): Promise<number> {
  const release = deps.onInterrupt(() => {
    void registry.stopAll();
  });
  try {
    await orchestrator.startWatch(options.targetDir, {
      blocking: true,
      initialRun: options.initialRun,
      overrides: options.overrides,
      emitter,
      env: deps.env,
    });
    await emitter.flush();
    return 0;
  } finally {
    release();
    await registry.stopAll();
  }
}

async function handleHistory(options: CliOptions): Promise<number> {
  const record = await loadLatestSession(path.resolve(options.targetDir));
  if (!record) {
    console.log(`No recorded sessions for ${path.resolve(options.targetDir)}.`);
    return 0;
  }
  if (options.json) {
    console.log(JSON.stringify(record, null, 2));
    return 0;
  }
  console.log(summarizeSession(record));
  for (const entry of record.results) {
    console.log(`  ${entry.status.padEnd(7)} ${entry.label}${entry.error ? `: ${entry.error}` : ''}`);
  }
  return 0;
}

function apiPort(options: CliOptions, env: NodeJS.ProcessEnv): number {
  return options.port ?? (Number(env.AETHER_API_PORT) || DEFAULT_PORT);
}

async function handleStop(options: CliOptions, deps: Required<CliDeps>): Promise<number> {
  const secret = deps.env.AETHER_API_SECRET?.trim();
  if (!secret) {
    console.error('[Aether] stop talks to a running `aether serve`; set AETHER_API_SECRET to sign the request.');
    return 1;
  }
  const body = JSON.stringify({ targetDir: path.resolve(options.targetDir) });
  const response = await fetch(`http://127.0.0.1:${apiPort(options, deps.env)}/watch/stop`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', 'X-Signature': signPayload(secret, body) },
    body,
  });
  const text = await response.text();
  if (!response.ok) {
    console.error(`[Aether] Stop request failed (${response.status}): ${text}`);
    return 1;
  }
  console.log(text);
  return 0;
}

async function handleServe(options: CliOptions, deps: Required<CliDeps>): Promise<number> {
  const registry = new LifecycleRegistry();
  const pipeline = deps.createPipeline(registry, acceptDefault);
  const secret = deps.env.AETHER_API_SECRET?.trim() || undefined;
  const hub = new EventHub({ secret });
  const server = await startControlServer(
    { pipeline, watches: new WatchOrchestrator(pipeline), secret, hub },
    { port: apiPort(options, deps.env) },
  );
  console.log(`[Aether] Control API listening on http://127.0.0.1:${server.port} (events on /ws).`);
  if (!secret) {
    console.warn('[Aether] AETHER_API_SECRET is not set; signed endpoints will answer 503.');
  }

  await new Promise<void>((resolve) => {
    const release = deps.onInterrupt(() => {
      release();
      resolve();
    });
  });
  await registry.stopAll();
  await server.close();
  return 0;
}

/**
 * Entry point for the command line. Returns the process exit code:
 * 0 success, 1 failed tests or a failed command, 2 invalid usage or
 * configuration.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (!parsed.ok) {
    console.error(`[Aether] ${parsed.error}`);
    console.error(`Run 'aether --help' to see available commands.`);
    return 2;
  }

  const resolved: Required<CliDeps> = {
    env: deps.env ?? process.env,
    createPipeline: deps.createPipeline ?? ((registry, confirm) => new PipelineController({ registry, confirm })),
    onInterrupt: deps.onInterrupt ?? onSigint,
    interactive: deps.interactive ?? Boolean(process.stdout.isTTY && process.stdin.isTTY),
  };
  const { options } = parsed;

  try {
    switch (options.command) {
      case 'help':
        console.log(HELP_TEXT);
        return 0;
      case 'run':
        return await handleRun(options, resolved);
      case 'watch':
        return await handleWatch(options, resolved);
      case 'stop':
        return await handleStop(options, resolved);
      case 'history':
        return await handleHistory(options);
      case 'serve':
        return await handleServe(options, resolved);
    }
  } catch (error) {
    if (error instanceof PipelineError) {
      console.error(`[Aether] ${error.describe()}`);
      return error.code === 'config_invalid' ? 2 : 1;
    }
    console.error(`[Aether] ${errorMessage(error)}`);
    return 1;
  }
}
