import type { MailboxSession, Uid, Year } from '../core/types.js';
import { MoveError } from '../core/errors.js';
import { createUidSet, yearToFolder } from '../core/utils.js';
import type { ArchiverEventEmitter } from '../events/emitter.js';

export class MessageArchiver {
  constructor(
    private readonly session: MailboxSession,
    private readonly events?: ArchiverEventEmitter,
  ) {}

  /**
   * Moves `uids` into the year's archive folder with a single UID MOVE.
   * The folder is assumed to exist; see `FolderProvisioner.ensureFolder`.
   */
  async archive(year: Year, uids: readonly Uid[]): Promise<number> {
    const folder = yearToFolder(year);
    const uidSet = createUidSet(uids);

    try {
      await this.session.moveMessages(uidSet, folder);
    } catch (err) {
      throw err instanceof MoveError ? err : new MoveError(folder, uidSet, err);
    }

    this.events?.emit('messages:moved', { year, folder, count: uids.length });
    return uids.length;
  }
}
