import * as os from 'node:os';
import * as path from 'node:path';

const DEFAULT_DIR_NAME = '.tmux-bridge';

/** Base directory for config, state and logs. */
export function getBridgeHome(env: NodeJS.ProcessEnv = process.env): string {
    const override = env.TMUX_BRIDGE_HOME?.trim();
    if (override) return path.resolve(override);
    return path.join(os.homedir(), DEFAULT_DIR_NAME);
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    const override = env.TMUX_BRIDGE_CONFIG_PATH?.trim();
    if (override) return path.resolve(override);
    return path.join(getBridgeHome(env), 'config.json');
}

/** Holds the cursor file and the sent/received audit logs. */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
    return path.join(getBridgeHome(env), 'state');
}

export function getStatePath(env: NodeJS.ProcessEnv = process.env): string {
    return path.join(getStateDir(env), 'listener_state.json');
}

export function getLogDir(env: NodeJS.ProcessEnv = process.env): string {
    return path.join(getBridgeHome(env), 'logs');
}
