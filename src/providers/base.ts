import type {
  FetchedRecord,
  FolderEntry,
  MailboxInfo,
  MailboxSession,
  Uid,
  Year,
} from '../core/types.js';
import { ArchiverError, TransportError } from '../core/errors.js';

export abstract class BaseSession implements MailboxSession {
  abstract readonly name: string;

  protected connected = false;

  isConnected(): boolean {
    return this.connected;
  }

  protected ensureConnected(): void {
    if (!this.connected) {
      throw new TransportError(`${this.name} session is not connected. Call connect() first.`);
    }
  }

  protected wrapError(message: string, cause: unknown): ArchiverError {
    if (cause instanceof ArchiverError) return cause;
    return new TransportError(`[${this.name}] ${message}`, cause);
  }

  abstract connect(): Promise<void>;
  abstract disconnect(): Promise<void>;

  abstract openMailbox(name: string): Promise<MailboxInfo>;
  abstract hasCapability(name: string): boolean;

  abstract listFolders(pattern: string): Promise<FolderEntry[]>;
  abstract createFolder(name: string): Promise<void>;

  abstract searchAll(): Promise<Uid[]>;
  abstract searchBefore(uidSet: string, year: Year): Promise<Uid[]>;
  abstract fetchMetadata(uidSet: string): Promise<FetchedRecord[]>;
  abstract moveMessages(uidSet: string, destination: string): Promise<void>;
}
