import type {
  FetchedRecord,
  FolderEntry,
  MailboxInfo,
  ResolvedImapConfig,
  Uid,
  Year,
} from '../core/types.js';
import { tryImport } from '../core/utils.js';
import { DependencyError, FolderCreateError, MoveError, TransportError } from '../core/errors.js';
import { BaseSession } from './base.js';

type ImapFlowConstructor = new (config: Record<string, unknown>) => ImapClient;

// CommonJS package: the class may only be reachable through `default`.
interface ImapFlowModule {
  ImapFlow?: ImapFlowConstructor;
  default?: { ImapFlow?: ImapFlowConstructor };
}

/** The slice of imapflow's `ImapFlow` the archiver drives. */
export interface ImapClient {
  connect(): Promise<void>;
  logout(): Promise<void>;
  getMailboxLock(path: string, options?: Record<string, unknown>): Promise<ImapMailboxLock>;
  list(options?: Record<string, unknown>): Promise<ImapListEntry[]>;
  mailboxCreate(path: string): Promise<{ path: string; created?: boolean }>;
  search(query: Record<string, unknown>, options?: Record<string, unknown>): Promise<number[] | false>;
  fetch(
    range: string,
    query: Record<string, unknown>,
    options?: Record<string, unknown>,
  ): AsyncIterable<ImapFetchResult>;
  messageMove(
    range: string,
    destination: string,
    options?: Record<string, unknown>,
  ): Promise<unknown>;
  capabilities: Map<string, boolean | number>;
  /** The selected mailbox, `false` while none is. */
  mailbox: ImapMailboxObject | false;
}

export interface ImapMailboxLock {
  path: string;
  release(): void;
}

export interface ImapMailboxObject {
  path: string;
  exists: number;
  uidValidity?: bigint | number;
}

export interface ImapListEntry {
  path: string;
  name: string;
  delimiter: string;
}

export interface ImapFetchResult {
  uid?: number;
  internalDate?: Date | string;
}

export type ImapClientFactory = (options: Record<string, unknown>) => ImapClient | Promise<ImapClient>;

async function loadImapFlow(options: Record<string, unknown>): Promise<ImapClient> {
  const mod = await tryImport<ImapFlowModule>('imapflow', 'IMAP sessions');
  const ImapFlow = mod.ImapFlow ?? mod.default?.ImapFlow;
  if (!ImapFlow) throw new DependencyError('imapflow', 'IMAP sessions');
  return new ImapFlow(options);
}

export class ImapSession extends BaseSession {
  readonly name = 'imap';

  private client: ImapClient | null = null;
  private mailboxLock: ImapMailboxLock | null = null;

  constructor(
    private readonly config: ResolvedImapConfig,
    private readonly createClient: ImapClientFactory = loadImapFlow,
  ) {
    super();
  }

  async connect(): Promise<void> {
    try {
      const client = await this.createClient({
        host: this.config.host,
        port: this.config.port,
        secure: this.config.secure,
        // plain-port connections either insist on STARTTLS or never try it
        doSTARTTLS: this.config.secure ? undefined : this.config.starttls,
        auth: { user: this.config.auth.user, pass: this.config.auth.pass },
        logger: false,
      });
      await client.connect();
      this.client = client;
      this.connected = true;
    } catch (err) {
      throw this.wrapError(`Failed to connect to ${this.config.host}:${this.config.port}`, err);
    }
  }

  async disconnect(): Promise<void> {
    this.releaseMailbox();
    try {
      if (this.client) await this.client.logout();
    } catch {
      // best-effort
    }
    this.client = null;
    this.connected = false;
  }

  private releaseMailbox(): void {
    this.mailboxLock?.release();
    this.mailboxLock = null;
  }

  private imapClient(): ImapClient {
    this.ensureConnected();
    if (!this.client) {
      throw new TransportError(`${this.name} session has no client`);
    }
    return this.client;
  }

  hasCapability(name: string): boolean {
    return this.imapClient().capabilities.has(name.toUpperCase());
  }

  /** Selects `name` and holds its lock until the next select or `disconnect()`. */
  async openMailbox(name: string): Promise<MailboxInfo> {
    const client = this.imapClient();
    this.releaseMailbox();
    try {
      this.mailboxLock = await client.getMailboxLock(name);
    } catch (err) {
      throw this.wrapError(`Failed to select mailbox ${name}`, err);
    }

    const mailbox = client.mailbox;
    if (!mailbox) {
      this.releaseMailbox();
      throw new TransportError(`[${this.name}] Mailbox ${name} is not selected`);
    }
    return {
      path: mailbox.path,
      exists: mailbox.exists,
      uidValidity: mailbox.uidValidity,
    };
  }

  async listFolders(pattern: string): Promise<FolderEntry[]> {
    try {
      const mailboxes = await this.imapClient().list();
      return mailboxes
        .filter((mb) => mb.path === pattern)
        .map((mb) => ({ path: mb.path, name: mb.name, delimiter: mb.delimiter }));
    } catch (err) {
      throw this.wrapError(`Failed to list mailboxes matching ${pattern}`, err);
    }
  }

  async createFolder(name: string): Promise<void> {
    const client = this.imapClient();
    try {
      await client.mailboxCreate(name);
    } catch (err) {
      throw new FolderCreateError(name, err);
    }
  }

  async searchAll(): Promise<Uid[]> {
    let uids: number[] | false;
    try {
      uids = await this.imapClient().search({ all: true }, { uid: true });
    } catch (err) {
      throw this.wrapError('UID SEARCH ALL failed', err);
    }
    if (uids === false) {
      throw new TransportError(`[${this.name}] UID SEARCH ALL was rejected`);
    }
    return uids;
  }

  async searchBefore(uidSet: string, year: Year): Promise<Uid[]> {
    let uids: number[] | false;
    try {
      uids = await this.imapClient().search(
        { uid: uidSet, before: new Date(Date.UTC(year, 0, 1)) },
        { uid: true },
      );
    } catch (err) {
      throw this.wrapError(`UID SEARCH BEFORE 1-Jan-${year} failed`, err);
    }
    if (uids === false) {
      throw new TransportError(`[${this.name}] UID SEARCH BEFORE 1-Jan-${year} was rejected`);
    }
    return uids;
  }

  async fetchMetadata(uidSet: string): Promise<FetchedRecord[]> {
    const records: FetchedRecord[] = [];
    try {
      for await (const msg of this.imapClient().fetch(
        uidSet,
        { uid: true, internalDate: true },
        { uid: true },
      )) {
        records.push({ uid: msg.uid, internalDate: msg.internalDate });
      }
    } catch (err) {
      throw this.wrapError(`Failed to fetch UID ${uidSet}`, err);
    }
    return records;
  }

  async moveMessages(uidSet: string, destination: string): Promise<void> {
    const client = this.imapClient();
    let result: unknown;
    try {
      result = await client.messageMove(uidSet, destination, { uid: true });
    } catch (err) {
      throw new MoveError(destination, uidSet, err);
    }
    if (result === false) {
      throw new MoveError(destination, uidSet);
    }
  }
}
