/**
 * Trigger event types
 */

export type TriggerSourceKind = 'EMAIL';

export interface EmailPayload {
  /** Sender as received, e.g. `Jane Doe <jane@example.com>` */
  sender: string;
  /** Plain address extracted from `sender` */
  senderAddress: string;
  subject: string;
  /** Plain-text body; HTML bodies are stripped */
  body: string;
  threadId?: string;
  messageId?: string;
}

export interface TriggerEvent {
  readonly id: string;
  readonly source: TriggerSourceKind;
  readonly userId: string;
  readonly occurredAt: Date;
  readonly payload: Readonly<EmailPayload>;
  /** Catalog account of the monitored inbox */
  readonly connectedAccountId?: string;
  readonly triggerId?: string;
}

/** Handles one accepted event; the returned promise is its acknowledgement */
export type TriggerEventHandler = (event: TriggerEvent, signal: AbortSignal) => Promise<void>;
