import { loadBridgeConfig, type BridgeConfig } from '../config/env-validator.js';
import { TelegramHandler } from '../interfaces/telegram_handler.js';
import { FileAuditLog } from '../services/audit-log.js';
import { FileStateStore } from '../services/listener-state.js';
import { MessageRouter } from '../services/message-router.js';
import { TmuxSessionRegistry } from '../services/session-registry.js';
import { TmuxInjector } from '../services/tmux-injector.js';
import type { TmuxRunner } from '../services/tmux-client.js';
import { configureLogger, logError, logThought, logWarning } from '../utils/logger.js';
import { STARTUP_FAILURE_EXIT_CODE } from './cli.js';
import { ListenerDaemon } from './listener.js';

/** Wire the production collaborators for one listener process. */
export function createListener(config: BridgeConfig, run: TmuxRunner): ListenerDaemon {
  const telegram = TelegramHandler.fromToken(config.botToken, { chatId: config.chatId });
  const router = new MessageRouter(new TmuxSessionRegistry(run), new TmuxInjector(run), {
    sourceLabel: config.sourceLabel,
    authorizedChatId: config.chatId,
    authorizedUserId: config.userId,
  });

  return new ListenerDaemon(
    {
      source: telegram,
      notifier: telegram,
      router,
      store: new FileStateStore(config.statePath),
      audit: new FileAuditLog(config.stateDir),
    },
    { pollTimeoutSeconds: config.pollTimeoutSeconds },
  );
}

/**
 * Start the daemon and keep it running until SIGINT/SIGTERM.
 *
 * The only exits before the loop are startup failures (bad config, unreadable
 * state), reported with {@link STARTUP_FAILURE_EXIT_CODE}.
 */
export async function runListenerCli(env: NodeJS.ProcessEnv, run: TmuxRunner): Promise<number> {
  let config: BridgeConfig;
  try {
    config = await loadBridgeConfig(env);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[tmux-bridge] Startup blocked: ${message}`);
    console.error("Run 'tmux-bridge doctor' for a full diagnosis.");
    return STARTUP_FAILURE_EXIT_CODE;
  }

  configureLogger({ directory: config.logDir, level: config.logLevel });
  void logThought('============================================================');
  void logThought('tmux-bridge listener starting');
  void logThought(`Loaded Telegram config - Chat ID: ${config.chatId}`);
  if (config.userId) {
    void logThought(`User ID validation enabled - only user ${config.userId} can route replies.`);
  } else {
    void logWarning('User ID validation disabled - anyone in the chat can route replies.');
  }

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals): void => {
    void logThought(`[tmux-bridge] Received ${signal}, stopping listener.`);
    controller.abort();
    // An in-flight long poll cannot be cancelled; the cursor never passed
    // anything unrouted, so exiting here loses nothing.
    process.exit(0);
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const listener = createListener(config, run);
  try {
    await listener.run(controller.signal);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    await logError(`[tmux-bridge] Listener could not start: ${message}`);
    return STARTUP_FAILURE_EXIT_CODE;
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
  return 0;
}
