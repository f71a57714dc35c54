import { resolveConfig } from './core/config.js';
import { ProtocolInvariantViolation, TransportError } from './core/errors.js';
import { createUidSet } from './core/utils.js';
import { createSession } from './providers/index.js';
import { batchUids } from './archive/batcher.js';
import { classifyByYear, currentYear } from './archive/classifier.js';
import { resolveServerYears } from './archive/calendar.js';
import { FolderCache } from './archive/folder-cache.js';
import { FolderProvisioner } from './archive/provisioner.js';
import { MessageArchiver } from './archive/archiver.js';
import { ArchiverEventEmitter } from './events/emitter.js';
import type { ArchiverListener } from './events/emitter.js';

import type {
  ArchiverConfig,
  ArchiverEvent,
  BatchResult,
  MailboxInfo,
  MailboxSession,
  ResolvedArchiverConfig,
  RunSummary,
  Uid,
  Year,
} from './core/types.js';

/**
 * Moves every message of one mailbox that predates the current year into
 * `Archives/<year>`. One instance is one run: the folder cache lives and dies
 * with it.
 */
export class YearArchiver {
  private readonly config: ResolvedArchiverConfig;
  private readonly session: MailboxSession;
  private readonly cache: FolderCache;
  private readonly provisioner: FolderProvisioner;
  private readonly archiver: MessageArchiver;
  private readonly eventEmitter: ArchiverEventEmitter;
  private connected = false;

  constructor(config: ArchiverConfig) {
    this.config = resolveConfig(config);

    this.session = createSession(this.config);
    this.eventEmitter = new ArchiverEventEmitter();
    this.cache = new FolderCache();
    this.provisioner = new FolderProvisioner(this.session, this.cache, this.eventEmitter);
    this.archiver = new MessageArchiver(this.session, this.eventEmitter);
  }

  // -------------------------------------------------------------------------
  // Connection
  // -------------------------------------------------------------------------

  async connect(): Promise<MailboxInfo> {
    await this.session.connect();

    if (!this.session.hasCapability('MOVE')) {
      throw new ProtocolInvariantViolation('Server does not advertise the MOVE capability');
    }

    const mailbox = await this.session.openMailbox(this.config.mailbox);
    if (mailbox.uidValidity === undefined) {
      throw new ProtocolInvariantViolation(`Mailbox ${mailbox.path} reports no UIDVALIDITY`);
    }

    this.connected = true;
    return mailbox;
  }

  async disconnect(): Promise<void> {
    await this.session.disconnect();
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new TransportError('Not connected. Call archiver.connect() first.');
    }
  }

  // -------------------------------------------------------------------------
  // Archiving
  // -------------------------------------------------------------------------

  async run(): Promise<RunSummary> {
    this.ensureConnected();

    const uids = await this.session.searchAll();
    const summary: RunSummary = {
      mailbox: this.config.mailbox,
      total: uids.length,
      batches: 0,
      moved: 0,
      skipped: 0,
      movedByYear: new Map(),
      foldersCreated: [],
    };
    this.eventEmitter.emit('run:started', { mailbox: summary.mailbox, total: summary.total });

    let index = 0;
    for (const batch of batchUids(uids, this.config.batchSize)) {
      const result = await this.processBatch(batch, index++);

      summary.batches += 1;
      summary.skipped += result.skipped;
      summary.foldersCreated.push(...result.foldersCreated);
      for (const [year, count] of result.movedByYear) {
        summary.moved += count;
        summary.movedByYear.set(year, (summary.movedByYear.get(year) ?? 0) + count);
      }
    }

    this.eventEmitter.emit('run:completed', summary);
    return summary;
  }

  /**
   * Fetches, classifies and archives one batch. Years are handled in
   * ascending order; each year's folder is ensured before its move.
   */
  async processBatch(uids: readonly Uid[], index = 0): Promise<BatchResult> {
    this.ensureConnected();
    this.eventEmitter.emit('batch:started', { index, size: uids.length });

    const records = await this.session.fetchMetadata(createUidSet(uids));
    const serverYears = await resolveServerYears(records, this.session);
    const { groups, skipped } = classifyByYear(records, currentYear(this.config.now), serverYears);
    const years = [...groups.keys()].sort((a, b) => a - b);
    this.eventEmitter.emit('batch:classified', { index, years, skipped: skipped.length });

    const result: BatchResult = {
      index,
      movedByYear: new Map(),
      skipped: skipped.length,
      foldersCreated: [],
    };

    for (const year of years) {
      const yearUids = groups.get(year) ?? [];
      const status = await this.provisioner.ensureFolder(year);
      if (status === 'created') result.foldersCreated.push(year);
      result.movedByYear.set(year, await this.archiver.archive(year, yearUids));
    }

    return result;
  }

  /** Years whose archive folder is confirmed to exist in this run. */
  knownYears(): Year[] {
    return this.cache.list();
  }

  // -------------------------------------------------------------------------
  // Events
  // -------------------------------------------------------------------------

  on<K extends ArchiverEvent>(event: K, listener: ArchiverListener<K>): () => void {
    return this.eventEmitter.on(event, listener);
  }

  off<K extends ArchiverEvent>(event: K, listener: ArchiverListener<K>): void {
    this.eventEmitter.off(event, listener);
  }
}

export function createArchiver(config: ArchiverConfig): YearArchiver {
  return new YearArchiver(config);
}

export { resolveConfig, loadConfigFromEnv, MAX_UIDS } from './core/config.js';
export { createUidSet, yearToFolder, ARCHIVE_ROOT } from './core/utils.js';
export { batchUids } from './archive/batcher.js';
export { classifyByYear, yearOf, currentYear } from './archive/classifier.js';
export { boundaryYear, resolveServerYears } from './archive/calendar.js';
export { FolderCache } from './archive/folder-cache.js';
export type { CacheLock } from './archive/folder-cache.js';
export { FolderProvisioner } from './archive/provisioner.js';
export { MessageArchiver } from './archive/archiver.js';
export { ArchiverEventEmitter } from './events/emitter.js';
export type { ArchiverListener } from './events/emitter.js';
export { createSession, BaseSession, ImapSession } from './providers/index.js';
export type { ImapClient, ImapClientFactory } from './providers/index.js';
export * from './core/errors.js';
export type * from './core/types.js';
