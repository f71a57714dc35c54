import type { MailboxSession, ResolvedArchiverConfig } from '../core/types.js';
import { ImapSession } from './imap.js';

export function createSession(config: ResolvedArchiverConfig): MailboxSession {
  return config.session ?? new ImapSession(config.imap);
}

export { BaseSession } from './base.js';
export { ImapSession } from './imap.js';
export type {
  ImapClient,
  ImapClientFactory,
  ImapFetchResult,
  ImapListEntry,
  ImapMailboxObject,
} from './imap.js';
