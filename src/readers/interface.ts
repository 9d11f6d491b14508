/**
 * Data readers
 *
 * Backends for the read_* actions (WhatsApp bridge, SMS, calendar,
 * contacts). They are registered as action handlers and never called
 * except through the ActionRunner.
 */

export type ReaderId = "whatsapp" | "sms" | "calendar" | "contacts";

export interface ReadQuery {
  /** Free-text filter (sender, subject, contact name) */
  text?: string;
  /** Only items newer than this epoch ms */
  since?: number;
  limit?: number;
}

export interface ReadItem {
  id: string;
  /** Sender, organizer or contact name */
  from?: string;
  text: string;
  at: number;
}

export interface DataReader {
  read(query: ReadQuery): Promise<ReadItem[]>;
}

export type ReaderSet = Partial<Record<ReaderId, DataReader>>;

/** Text files the edit_file action may change */
export interface FileStore {
  read(path: string): Promise<string>;
  write(path: string, content: string): Promise<void>;
}
