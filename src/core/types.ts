// ---------------------------------------------------------------------------
// Mailbox primitives
// ---------------------------------------------------------------------------

export type Uid = number;
export type Year = number;

/** UID and INTERNALDATE of one message, as the server returned them. */
export interface FetchedRecord {
  uid?: Uid;
  internalDate?: Date | string;
}

export interface FolderEntry {
  path: string;
  name: string;
  delimiter: string;
}

export interface MailboxInfo {
  path: string;
  exists: number;
  uidValidity?: bigint | number;
}

export type YearGroup = Map<Year, Uid[]>;

export interface ClassifiedBatch {
  groups: YearGroup;
  /** Current-year messages, left where they are. */
  skipped: Uid[];
}

// ---------------------------------------------------------------------------
// Session port
// ---------------------------------------------------------------------------

export interface MailboxSession {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  openMailbox(name: string): Promise<MailboxInfo>;
  hasCapability(name: string): boolean;

  listFolders(pattern: string): Promise<FolderEntry[]>;
  createFolder(name: string): Promise<void>;

  searchAll(): Promise<Uid[]>;
  /** UIDs of `uidSet` whose internal date, in the server's calendar, precedes 1 Jan of `year`. */
  searchBefore(uidSet: string, year: Year): Promise<Uid[]>;
  fetchMetadata(uidSet: string): Promise<FetchedRecord[]>;
  moveMessages(uidSet: string, destination: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface ImapAuth {
  user: string;
  pass: string;
}

export interface ImapConnectionConfig {
  host: string;
  port?: number;
  secure?: boolean;
  starttls?: boolean;
  auth: ImapAuth;
}

export interface ArchiverConfig {
  imap: ImapConnectionConfig;
  mailbox?: string;
  batchSize?: number;
  /** Replaces the IMAP connection, e.g. with an in-memory session. */
  session?: MailboxSession;
  /** Clock used to decide the current year. */
  now?: () => Date;
}

export interface ResolvedImapConfig {
  host: string;
  port: number;
  secure: boolean;
  starttls: boolean;
  auth: ImapAuth;
}

export interface ResolvedArchiverConfig {
  imap: ResolvedImapConfig;
  mailbox: string;
  batchSize: number;
  session?: MailboxSession;
  now: () => Date;
}

// ---------------------------------------------------------------------------
// Run results & events
// ---------------------------------------------------------------------------

export type FolderStatus = 'cached' | 'found' | 'created';

export interface BatchResult {
  index: number;
  movedByYear: Map<Year, number>;
  skipped: number;
  foldersCreated: Year[];
}

export interface RunSummary {
  mailbox: string;
  total: number;
  batches: number;
  moved: number;
  skipped: number;
  movedByYear: Map<Year, number>;
  foldersCreated: Year[];
}

export type ArchiverEvent =
  | 'run:started'
  | 'batch:started'
  | 'batch:classified'
  | 'folder:found'
  | 'folder:created'
  | 'messages:moved'
  | 'run:completed';

export type ArchiverEventMap = {
  'run:started': { mailbox: string; total: number };
  'batch:started': { index: number; size: number };
  'batch:classified': { index: number; years: Year[]; skipped: number };
  'folder:found': { year: Year; folder: string };
  'folder:created': { year: Year; folder: string };
  'messages:moved': { year: Year; folder: string; count: number };
  'run:completed': RunSummary;
};
