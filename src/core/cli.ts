import { loadBridgeConfig, type BridgeConfig } from '../config/env-validator.js';
import { getConfigPath, getStatePath } from '../config/workspace.js';
import { TelegramHandler } from '../interfaces/telegram_handler.js';
import { FileAuditLog } from '../services/audit-log.js';
import { FileStateStore } from '../services/listener-state.js';
import { escapeHtml } from '../services/message-router.js';
import { TmuxSessionRegistry } from '../services/session-registry.js';
import { createTmuxRunner, resolveCurrentSession, type TmuxRunner } from '../services/tmux-client.js';
import type { Notifier } from '../types/messaging.js';
import { formatDoctorReport, runDoctorChecks } from './doctor.js';

/** Exit status for configuration or state problems found before the loop starts. */
export const STARTUP_FAILURE_EXIT_CODE = 2;

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: tmux-bridge [command] [options]

Commands:
  listen              Start the listener daemon (default when no command is given)
  notify <message>    Send a notification to the Telegram chat
  sessions            List live tmux sessions
  status              Show the bridge directory, cursor and credential state
  doctor              Run diagnostics and validate prerequisites

Options:
  --help, -h          Show this help message
  --json              Output in machine-readable JSON format (doctor only)
  --session <name>    Session to name in a notification (default: current tmux session)

Replying:
  Answer in Telegram with "session-name: your reply" and the reply is typed
  into that tmux session.

Examples:
  tmux-bridge
  tmux-bridge notify "Build finished, deploy?"
  tmux-bridge notify --session build-1 "Tests are green"
  tmux-bridge doctor --json
`.trim();

export interface CliDeps {
  env: NodeJS.ProcessEnv;
  run: TmuxRunner;
  createNotifier: (config: BridgeConfig) => Notifier;
  verifyBot: (config: BridgeConfig) => Promise<string>;
}

export function defaultCliDeps(env: NodeJS.ProcessEnv = process.env): CliDeps {
  return {
    env,
    run: createTmuxRunner(),
    createNotifier: (config) => TelegramHandler.fromToken(config.botToken, { chatId: config.chatId }),
    verifyBot: (config) => TelegramHandler.fromToken(config.botToken, { chatId: config.chatId }).verify(),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
  if (!argv.includes('--help') && !argv.includes('-h')) return false;

  console.log(HELP_TEXT);
  process.exitCode = 0;
  return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
  if (argv.length === 0) return false;

  const command = argv[0];
  const KNOWN_COMMANDS = new Set(['listen', 'notify', 'sessions', 'status', 'doctor']);

  if (KNOWN_COMMANDS.has(command) || command.startsWith('-')) {
    return false;
  }

  console.error(`[tmux-bridge] Unknown command: '${command}'`);
  console.error(`Run 'tmux-bridge --help' to see available commands.`);
  process.exitCode = 1;
  return true;
}

/**
 * Handle the `doctor` command.
 * Exit code 0 when healthy, 1 when degraded, 2 when a critical check fails.
 */
export async function handleDoctorCli(argv: string[], deps: CliDeps): Promise<boolean> {
  if (argv[0] !== 'doctor') return false;

  const asJson = argv.includes('--json');
  const report = await runDoctorChecks({ run: deps.run, env: deps.env, verifyBot: deps.verifyBot });
  console.log(formatDoctorReport(report, asJson));

  if (report.status === 'critical') {
    process.exitCode = 2;
  } else if (report.status === 'degraded') {
    process.exitCode = 1;
  } else {
    process.exitCode = 0;
  }
  return true;
}

/** Handle `sessions`: print one live tmux session per line. */
export async function handleSessionsCli(argv: string[], deps: CliDeps): Promise<boolean> {
  if (argv[0] !== 'sessions') return false;

  try {
    const sessions = [...(await new TmuxSessionRegistry(deps.run).listSessions())].sort();
    if (sessions.length === 0) {
      console.log('No tmux sessions are running.');
    } else {
      console.log(sessions.join('\n'));
    }
    process.exitCode = 0;
  } catch (error) {
    console.error(`[tmux-bridge] ${errorMessage(error)}`);
    process.exitCode = 1;
  }
  return true;
}

/** Handle `status`: where things live, the cursor, and whether credentials are set. */
export async function handleStatusCli(argv: string[], deps: CliDeps): Promise<boolean> {
  if (argv[0] !== 'status') return false;

  const statePath = getStatePath(deps.env);
  const lines = [`Config: ${getConfigPath(deps.env)}`, `State:  ${statePath}`];

  try {
    const state = await new FileStateStore(statePath).load();
    lines.push(`Cursor: ${state.lastUpdateId}`);
  } catch (error) {
    lines.push(`Cursor: unreadable (${errorMessage(error)})`);
  }

  try {
    await loadBridgeConfig(deps.env);
    lines.push('Credentials: configured');
    process.exitCode = 0;
  } catch (error) {
    lines.push(`Credentials: ${errorMessage(error)}`);
    process.exitCode = 1;
  }

  console.log(lines.join('\n'));
  return true;
}

export interface NotifyArgs {
  session: string | null;
  message: string;
}

/** Split `notify [--session <name>] <message...>`. */
export function parseNotifyArgs(args: string[]): NotifyArgs {
  let session: string | null = null;
  const words: string[] = [];

  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    if (arg === '--session') {
      session = args[index + 1] ?? null;
      index++;
      continue;
    }
    words.push(arg);
  }

  return { session, message: words.join(' ').trim() };
}

/**
 * Body of a notification. With a session, the message carries the exact
 * `session: ...` prefix the listener expects in a reply.
 */
export function formatNotification(session: string | null, message: string): string {
  if (!session) {
    return escapeHtml(message);
  }
  const name = escapeHtml(session);
  return `<b>[${name}]</b> ${escapeHtml(message)}\n\nReply with: <code>${name}: your reply</code>`;
}

/** Handle `notify`: push one message from the terminal to the chat. */
export async function handleNotifyCli(argv: string[], deps: CliDeps): Promise<boolean> {
  if (argv[0] !== 'notify') return false;

  const args = parseNotifyArgs(argv.slice(1));
  if (!args.message) {
    console.error('[tmux-bridge] Usage: tmux-bridge notify [--session <name>] <message>');
    process.exitCode = 1;
    return true;
  }

  let config: BridgeConfig;
  try {
    config = await loadBridgeConfig(deps.env);
  } catch (error) {
    console.error(`[tmux-bridge] ${errorMessage(error)}`);
    process.exitCode = STARTUP_FAILURE_EXIT_CODE;
    return true;
  }

  let session = args.session;
  if (!session) {
    try {
      session = await resolveCurrentSession(deps.run, deps.env);
    } catch (error) {
      console.warn(`[tmux-bridge] Could not resolve the current tmux session: ${errorMessage(error)}`);
    }
  }

  const delivered = await deps.createNotifier(config).sendText(formatNotification(session, args.message));
  await new FileAuditLog(config.stateDir).recordOutgoing(session, args.message, delivered);

  if (delivered) {
    console.log(session ? `Sent notification for session ${session}.` : 'Sent notification.');
    process.exitCode = 0;
  } else {
    console.error('[tmux-bridge] Notification could not be delivered; see the listener log for details.');
    process.exitCode = 1;
  }
  return true;
}
