import * as fs from 'node:fs/promises';
import path from 'node:path';

/** Everything the listener carries across restarts. */
export interface ListenerState {
    /** Highest Bot API update id already routed; 0 before the first one. */
    lastUpdateId: number;
}

/** On-disk layout of the state file. */
interface PersistedListenerState {
    last_update_id: number;
}

export interface StateStore {
    load(): Promise<ListenerState>;
    save(state: ListenerState): Promise<void>;
}

export class StateStoreError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StateStoreError';
    }
}

export const INITIAL_STATE: ListenerState = { lastUpdateId: 0 };

export function advanceCursor(state: ListenerState, highestId: number | null): ListenerState {
    if (highestId === null || highestId <= state.lastUpdateId) return state;
    return { lastUpdateId: highestId };
}

function parseState(raw: string, filePath: string): ListenerState {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new StateStoreError(`Listener state at ${filePath} is not valid JSON: ${reason}`, { cause: error });
    }

    if (typeof parsed !== 'object' || parsed === null || !('last_update_id' in parsed)) {
        throw new StateStoreError(`Listener state at ${filePath} has no last_update_id field.`);
    }
    const value = parsed.last_update_id;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
        throw new StateStoreError(`Listener state at ${filePath} has an invalid last_update_id: ${String(value)}.`);
    }
    return { lastUpdateId: value };
}

/**
 * JSON file store for the update cursor.
 *
 * Writes go to a temp file first and are renamed into place, so a crash
 * mid-write leaves the previous cursor intact.
 */
export class FileStateStore implements StateStore {
    readonly #filePath: string;

    constructor(filePath: string) {
        this.#filePath = filePath;
    }

    get filePath(): string {
        return this.#filePath;
    }

    async load(): Promise<ListenerState> {
        let raw: string;
        try {
            raw = await fs.readFile(this.#filePath, 'utf-8');
        } catch (error) {
            const fsError = error as NodeJS.ErrnoException;
            if (fsError.code === 'ENOENT') return { ...INITIAL_STATE };
            throw new StateStoreError(`Failed to read listener state at ${this.#filePath}: ${fsError.message}`, { cause: error });
        }
        return parseState(raw, this.#filePath);
    }

    async save(state: ListenerState): Promise<void> {
        const persisted: PersistedListenerState = { last_update_id: state.lastUpdateId };
        await fs.mkdir(path.dirname(this.#filePath), { recursive: true });

        const tempPath = `${this.#filePath}.${process.pid}.tmp`;
        try {
            await fs.writeFile(tempPath, `${JSON.stringify(persisted, null, 2)}\n`, { encoding: 'utf-8', mode: 0o600 });
            await fs.rename(tempPath, this.#filePath);
        } catch (error) {
            await fs.rm(tempPath, { force: true });
            const reason = error instanceof Error ? error.message : String(error);
            throw new StateStoreError(`Failed to save listener state to ${this.#filePath}: ${reason}`, { cause: error });
        }
    }
}
