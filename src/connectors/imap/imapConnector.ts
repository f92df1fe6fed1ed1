import { ImapFlow, type FetchQueryObject, type MessageAddressObject, type SearchObject } from 'imapflow';
import { config, requireEnv } from '../../config.js';
import { logger } from '../../logger.js';
import type { FetchedMailMessage } from '../../types.js';
import type { FetchOptions, MailConnector } from '../types.js';
import { parseSearchCriteria } from './criteria.js';

export interface ImapConfig {
  host: string;
  port: number;
  secure: boolean;
  auth: {
    user: string;
    pass: string;
  };
}

export interface ImapMessage {
  uid: number;
  source?: Buffer;
  envelope?: {
    messageId?: string;
    subject?: string;
    from?: MessageAddressObject[];
  };
  internalDate?: Date | string;
}

/** The part of the imapflow client the connector drives. */
export interface ImapClient {
  connect(): Promise<void>;
  logout(): Promise<void>;
  close(): void;
  list(): Promise<Array<{ path: string }>>;
  getMailboxLock(path: string): Promise<{ release(): void }>;
  search(query: SearchObject, options: { uid: true }): Promise<number[] | false>;
  fetch(range: number[], query: FetchQueryObject, options: { uid: true }): AsyncIterable<ImapMessage>;
  messageFlagsAdd(range: number[], flags: string[], options: { uid: true }): Promise<unknown>;
}

function toIsoDate(value: Date | string | undefined): string {
  if (!value) {
    return new Date().toISOString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? new Date().toISOString() : parsed.toISOString();
}

function formatAddresses(addresses: MessageAddressObject[] | undefined): string {
  return (addresses ?? [])
    .map((a) => (a.name ? `${a.name} <${a.address ?? ''}>` : a.address ?? ''))
    .join(', ');
}

export function defaultImapConfig(): ImapConfig {
  return {
    host: requireEnv(config.imapHost, 'IMAP_HOST'),
    port: config.imapPort,
    secure: config.imapSecure,
    auth: {
      user: requireEnv(config.imapUser, 'IMAP_USER'),
      pass: requireEnv(config.imapPassword, 'IMAP_PASSWORD'),
    },
  };
}

export function createImapClient(imapConfig: ImapConfig): ImapClient {
  return new ImapFlow({ ...imapConfig, logger: false });
}

export class ImapConnector implements MailConnector {
  constructor(
    private readonly client: ImapClient = createImapClient(defaultImapConfig()),
    private readonly markSeen: boolean = config.imapMarkSeen,
  ) {}

  private async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (error) {
      this.client.close();
      throw error;
    }
  }

  async listFolders(): Promise<string[]> {
    await this.connect();
    try {
      const mailboxes = await this.client.list();
      return mailboxes.map((mailbox) => mailbox.path);
    } finally {
      await this.client.logout();
    }
  }

  async fetchEmails(options: FetchOptions): Promise<FetchedMailMessage[]> {
    const query = parseSearchCriteria(options.criteria);

    await this.connect();
    try {
      const lock = await this.client.getMailboxLock(options.folder);
      try {
        return await this.fetchLocked(query, options);
      } finally {
        lock.release();
      }
    } finally {
      await this.client.logout();
    }
  }

  private async fetchLocked(query: SearchObject, options: FetchOptions): Promise<FetchedMailMessage[]> {
    const uids = await this.client.search(query, { uid: true });
    const found = Array.isArray(uids) ? uids : [];
    const selected = options.limit > 0 ? found.slice(-options.limit) : [];
    logger.info({ folder: options.folder, found: found.length, selected: selected.length }, 'IMAP search done');
    if (!selected.length) {
      return [];
    }

    const out: FetchedMailMessage[] = [];
    const fetchedUids: number[] = [];
    // No other IMAP command may run until the fetch iterator is drained.
    for await (const msg of this.client.fetch(
      selected,
      { uid: true, envelope: true, source: true, internalDate: true },
      { uid: true },
    )) {
      if (!msg.source) {
        logger.warn({ uid: msg.uid }, 'Skipping IMAP message without source');
        continue;
      }

      out.push({
        provider: 'imap',
        messageId: msg.envelope?.messageId ?? String(msg.uid),
        subject: msg.envelope?.subject ?? '',
        from: formatAddresses(msg.envelope?.from),
        receivedAt: toIsoDate(msg.internalDate),
        raw: msg.source,
      });
      fetchedUids.push(msg.uid);
    }

    if (this.markSeen && fetchedUids.length) {
      await this.client.messageFlagsAdd(fetchedUids, ['\\Seen'], { uid: true });
    }

    return out;
  }
}
