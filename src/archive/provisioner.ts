import type { FolderStatus, MailboxSession, Year } from '../core/types.js';
import { FolderCreateError, ProtocolInvariantViolation } from '../core/errors.js';
import { yearToFolder } from '../core/utils.js';
import type { ArchiverEventEmitter } from '../events/emitter.js';
import type { FolderCache } from './folder-cache.js';

/**
 * Makes sure `Archives/<year>` exists before anything is moved there. At most
 * one LIST and one CREATE per year reach the server during a run.
 */
export class FolderProvisioner {
  constructor(
    private readonly session: MailboxSession,
    private readonly cache: FolderCache,
    private readonly events?: ArchiverEventEmitter,
  ) {}

  async ensureFolder(year: Year): Promise<FolderStatus> {
    const lock = await this.cache.acquire();
    try {
      if (this.cache.has(year)) return 'cached';

      const folder = yearToFolder(year);
      const matches = await this.session.listFolders(folder);
      if (matches.length > 1) {
        throw new ProtocolInvariantViolation(
          `Expected at most one mailbox named ${folder}, server listed ${matches.length}`,
        );
      }

      if (matches.length === 1) {
        this.cache.add(year, lock);
        this.events?.emit('folder:found', { year, folder });
        return 'found';
      }

      try {
        await this.session.createFolder(folder);
      } catch (err) {
        throw err instanceof FolderCreateError ? err : new FolderCreateError(folder, err);
      }
      this.cache.add(year, lock);
      this.events?.emit('folder:created', { year, folder });
      return 'created';
    } finally {
      lock.release();
    }
  }
}
