import * as fs from 'node:fs/promises';
import type { DoctorCheck, DoctorCheckResult, DoctorReport, DoctorStatus } from '../types/doctor.js';
import { readConfig } from '../config/json-config.js';
import { resolveBridgeConfig, validateRuntimeConfig, type BridgeConfig } from '../config/env-validator.js';
import { getBridgeHome, getConfigPath, getStatePath } from '../config/workspace.js';
import { FileStateStore } from '../services/listener-state.js';
import type { TmuxRunner } from '../services/tmux-client.js';

export interface DoctorDeps {
  run: TmuxRunner;
  env?: NodeJS.ProcessEnv;
  /** Confirms the bot token with the API; skipped when omitted. */
  verifyBot?: (config: BridgeConfig) => Promise<string>;
  now?: () => Date;
}

const CHECKS = {
  tmux: {
    kind: 'binary',
    name: 'tmux',
    description: 'tmux is installed and runnable.',
    severity: 'critical',
    remediation: 'Install tmux (e.g. `apt install tmux` or `brew install tmux`) and make sure it is on PATH.',
  },
  config: {
    kind: 'config',
    name: 'Configuration',
    description: 'Bot token and chat id are configured and well-formed.',
    severity: 'critical',
    remediation: 'Set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID in the environment, a .env file, or config.json.',
  },
  home: {
    kind: 'filesystem',
    name: 'Bridge directory',
    description: 'The bridge home directory is writable.',
    severity: 'critical',
    remediation: 'Create the directory or point TMUX_BRIDGE_HOME at a writable location.',
  },
  state: {
    kind: 'filesystem',
    name: 'Listener state',
    description: 'The update cursor file is absent or readable.',
    severity: 'critical',
    remediation: 'Fix or delete listener_state.json; deleting it replays any updates Telegram still holds.',
  },
  bot: {
    kind: 'service-endpoint',
    name: 'Telegram Bot API',
    description: 'The Bot API accepts the configured token.',
    severity: 'warning',
    remediation: 'Check the token with @BotFather and that api.telegram.org is reachable.',
  },
} satisfies Record<string, DoctorCheck>;

function safeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function pass(check: DoctorCheck, message: string, actual?: string): DoctorCheckResult {
  return { check, passed: true, message, actual };
}

function fail(check: DoctorCheck, message: string): DoctorCheckResult {
  return { check, passed: false, message };
}

async function checkTmux(run: TmuxRunner): Promise<DoctorCheckResult> {
  try {
    const { stdout } = await run(['-V']);
    const version = stdout.trim();
    return pass(CHECKS.tmux, `tmux is installed (${version}).`, version);
  } catch (err) {
    return fail(CHECKS.tmux, `tmux could not be run: ${safeError(err)}`);
  }
}

async function checkHome(home: string): Promise<DoctorCheckResult> {
  try {
    await fs.mkdir(home, { recursive: true });
    await fs.access(home, fs.constants.W_OK);
    return pass(CHECKS.home, `${home} is writable.`, home);
  } catch (err) {
    return fail(CHECKS.home, `${home} is not writable: ${safeError(err)}`);
  }
}

async function checkState(statePath: string): Promise<DoctorCheckResult> {
  try {
    const state = await new FileStateStore(statePath).load();
    return pass(CHECKS.state, `Cursor at update ${state.lastUpdateId}.`, String(state.lastUpdateId));
  } catch (err) {
    return fail(CHECKS.state, safeError(err));
  }
}

/**
 * Run every prerequisite check for the listener. Config problems are reported
 * by key and remediation only; no secret value is ever part of the report.
 */
export async function runDoctorChecks(deps: DoctorDeps): Promise<DoctorReport> {
  const env = deps.env ?? process.env;
  const now = deps.now ?? (() => new Date());
  const results: DoctorCheckResult[] = [];

  results.push(await checkTmux(deps.run));

  let resolved: BridgeConfig | null = null;
  try {
    const fileConfig = await readConfig(getConfigPath(env));
    const validation = validateRuntimeConfig(fileConfig, env, now);
    if (validation.ok) {
      resolved = resolveBridgeConfig(fileConfig, env);
      results.push(pass(CHECKS.config, `Configured keys: ${validation.presentKeys.join(', ')}.`));
    } else {
      results.push(fail(CHECKS.config, validation.issues.map((issue) => issue.message).join(' ')));
    }
  } catch (err) {
    results.push(fail(CHECKS.config, safeError(err)));
  }

  results.push(await checkHome(getBridgeHome(env)));
  results.push(await checkState(getStatePath(env)));

  if (deps.verifyBot && resolved) {
    try {
      const username = await deps.verifyBot(resolved);
      results.push(pass(CHECKS.bot, `Token accepted for bot @${username}.`, username));
    } catch (err) {
      results.push(fail(CHECKS.bot, `Bot API rejected the request: ${safeError(err)}`));
    }
  }

  return buildReport(results, now());
}

function buildReport(results: DoctorCheckResult[], checkedAt: Date): DoctorReport {
  const failedResults = results.filter((result) => !result.passed);
  let status: DoctorStatus = 'ok';
  if (failedResults.some((result) => result.check.severity === 'critical')) {
    status = 'critical';
  } else if (failedResults.length > 0) {
    status = 'degraded';
  }

  return {
    status,
    results,
    checkedAt: checkedAt.toISOString(),
    passed: results.length - failedResults.length,
    failed: failedResults.length,
  };
}

export function formatDoctorReport(report: DoctorReport, asJson = false): string {
  if (asJson) {
    return JSON.stringify(report, null, 2);
  }

  const lines = ['tmux-bridge doctor', '══════════════════════════════════════'];
  for (const result of report.results) {
    const icon = result.passed ? '✓' : result.check.severity === 'critical' ? '✗' : '⚠';
    lines.push(`  ${icon} ${result.check.name}: ${result.message}`);
    if (!result.passed) {
      lines.push(`      → ${result.check.remediation}`);
    }
  }
  lines.push('──────────────────────────────────────');
  lines.push(`Status: ${report.status.toUpperCase()}  (${report.passed} passed, ${report.failed} failed)`);
  return lines.join('\n');
}
