#!/usr/bin/env node
import 'dotenv/config';
import {
    defaultCliDeps,
    handleDoctorCli,
    handleHelpCli,
    handleNotifyCli,
    handleSessionsCli,
    handleStatusCli,
    handleUnknownCommand,
} from './core/cli.js';
import { runListenerCli } from './core/bridge.js';

const argv = process.argv.slice(2);
const deps = defaultCliDeps(process.env);

// ── One-shot commands (no listener startup) ──────────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

if (
    (await handleDoctorCli(argv, deps)) ||
    (await handleNotifyCli(argv, deps)) ||
    (await handleSessionsCli(argv, deps)) ||
    (await handleStatusCli(argv, deps))
) {
    process.exit(process.exitCode ?? 0);
}

// ── Listener daemon ──────────────────────────────────────────────────────────

process.exit(await runListenerCli(process.env, deps.run));
