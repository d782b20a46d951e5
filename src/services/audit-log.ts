import * as fs from 'node:fs/promises';
import path from 'node:path';
import type { DeliveryOutcome, Update } from '../types/messaging.js';
import { logError, scrubSensitiveText } from '../utils/logger.js';

const PREVIEW_LENGTH = 100;

export interface IncomingRecord {
  at: string;
  updateId: number;
  sender: string;
  outcome: DeliveryOutcome['kind'];
  destination: string | null;
  preview: string;
}

export interface OutgoingRecord {
  at: string;
  session: string | null;
  delivered: boolean;
  preview: string;
}

/** Sink for the sent/received trail. */
export interface AuditSink {
  recordIncoming(update: Update, outcome: DeliveryOutcome): Promise<void>;
  recordOutgoing(session: string | null, text: string, delivered: boolean): Promise<void>;
}

export function previewText(text: string): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();
  return singleLine.length > PREVIEW_LENGTH ? `${singleLine.slice(0, PREVIEW_LENGTH)}…` : singleLine;
}

function outcomeDestination(outcome: DeliveryOutcome): string | null {
  switch (outcome.kind) {
    case 'delivered':
    case 'not_found':
    case 'failed':
      return outcome.destination;
    default:
      return null;
  }
}

/**
 * Append-only JSON-lines audit files: one for replies received from the chat,
 * one for notifications sent to it. Write failures are logged, never thrown.
 */
export class FileAuditLog implements AuditSink {
  readonly #incomingPath: string;
  readonly #outgoingPath: string;
  readonly #now: () => Date;

  constructor(directory: string, now: () => Date = () => new Date()) {
    this.#incomingPath = path.join(directory, 'incoming.log');
    this.#outgoingPath = path.join(directory, 'outgoing.log');
    this.#now = now;
  }

  async recordIncoming(update: Update, outcome: DeliveryOutcome): Promise<void> {
    const record: IncomingRecord = {
      at: this.#now().toISOString(),
      updateId: update.id,
      sender: update.senderName,
      outcome: outcome.kind,
      destination: outcomeDestination(outcome),
      preview: previewText(update.text),
    };
    await this.#append(this.#incomingPath, record);
  }

  async recordOutgoing(session: string | null, text: string, delivered: boolean): Promise<void> {
    const record: OutgoingRecord = {
      at: this.#now().toISOString(),
      session,
      delivered,
      preview: previewText(text),
    };
    await this.#append(this.#outgoingPath, record);
  }

  async #append(filePath: string, record: IncomingRecord | OutgoingRecord): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.appendFile(filePath, `${scrubSensitiveText(JSON.stringify(record))}\n`, 'utf8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      await logError(`[AuditLog] Failed to append to ${filePath}: ${reason}`);
    }
  }
}
