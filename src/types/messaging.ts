/** One inbound chat message, normalized from the Bot API payload. */
export interface Update {
  /** Bot API `update_id`; strictly increasing in arrival order. */
  readonly id: number;
  readonly senderName: string;
  readonly senderId: string;
  /** Chat the message was posted in, used for authorization. */
  readonly chatId: string;
  readonly text: string;
}

/** A reply addressed to a tmux session: `destination: payload`. */
export interface ParsedMessage {
  destination: string;
  payload: string;
}

export type FailureStage = 'registry' | 'injection';

/** What happened to one routed Update. Drives the single reply sent back to the chat. */
export type DeliveryOutcome =
  | { kind: 'delivered'; destination: string }
  | { kind: 'not_found'; destination: string; availableSessions: string[] }
  | { kind: 'no_sessions' }
  | { kind: 'parse_skipped' }
  | { kind: 'unauthorized'; chatId: string; senderId: string }
  | { kind: 'failed'; destination: string; stage: FailureStage; diagnostic: string };

/** Result of one long poll against the Bot API. */
export type PollResult =
  | { ok: true; updates: Update[]; highestId: number | null }
  | { ok: false; error: string; attempts: number };

/** Inbound side of the message API. */
export interface UpdateSource {
  fetchUpdates(offset: number, timeoutSeconds: number): Promise<PollResult>;
}

/** Outbound side of the message API; resolves false instead of throwing. */
export interface Notifier {
  sendText(text: string): Promise<boolean>;
}
