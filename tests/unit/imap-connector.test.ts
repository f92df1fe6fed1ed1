import { describe, expect, it } from 'vitest';
import { ImapConnector, type ImapClient, type ImapMessage } from '../../src/connectors/imap/imapConnector.js';

class FakeImapClient implements ImapClient {
  readonly calls: string[] = [];
  private fetching = false;

  constructor(
    private readonly messages: ImapMessage[],
    private readonly folders: string[] = ['INBOX'],
  ) {}

  async connect(): Promise<void> {
    this.calls.push('connect');
  }

  async logout(): Promise<void> {
    this.calls.push('logout');
  }

  close(): void {
    this.calls.push('close');
  }

  async list(): Promise<Array<{ path: string }>> {
    return this.folders.map((path) => ({ path }));
  }

  async getMailboxLock(path: string): Promise<{ release(): void }> {
    if (!this.folders.includes(path)) {
      throw new Error(`Unknown mailbox: ${path}`);
    }
    this.calls.push(`lock ${path}`);
    return { release: () => this.calls.push('release') };
  }

  async search(): Promise<number[]> {
    return this.messages.map((message) => message.uid);
  }

  async *fetch(range: number[]): AsyncGenerator<ImapMessage> {
    this.fetching = true;
    for (const message of this.messages) {
      if (range.includes(message.uid)) {
        yield message;
      }
    }
    this.fetching = false;
  }

  async messageFlagsAdd(range: number[], flags: string[]): Promise<boolean> {
    if (this.fetching) {
      throw new Error('Command issued while a fetch is running');
    }
    this.calls.push(`flag ${flags.join(' ')} ${range.join(',')}`);
    return true;
  }
}

class UnreachableImapClient extends FakeImapClient {
  async connect(): Promise<void> {
    throw new Error('connection refused');
  }
}

function message(uid: number, source?: string): ImapMessage {
  return {
    uid,
    source: source === undefined ? undefined : Buffer.from(source),
    envelope: {
      messageId: `<m${uid}@shop.example>`,
      subject: `Order ${uid}`,
      from: [{ name: 'Shop', address: 'shop@example.com' }],
    },
    internalDate: new Date('2024-01-02T03:04:05Z'),
  };
}

const OPTIONS = { folder: 'INBOX', limit: 10, criteria: 'UNSEEN' };

describe('ImapConnector.fetchEmails', () => {
  it('marks fetched messages seen once the fetch has finished', async () => {
    const client = new FakeImapClient([message(1, 'raw-1'), message(2)]);

    const fetched = await new ImapConnector(client, true).fetchEmails(OPTIONS);

    expect(fetched).toEqual([
      {
        provider: 'imap',
        messageId: '<m1@shop.example>',
        subject: 'Order 1',
        from: 'Shop <shop@example.com>',
        receivedAt: '2024-01-02T03:04:05.000Z',
        raw: Buffer.from('raw-1'),
      },
    ]);
    expect(client.calls).toEqual(['connect', 'lock INBOX', 'flag \\Seen 1', 'release', 'logout']);
  });

  it('keeps the most recent messages up to the limit', async () => {
    const client = new FakeImapClient([message(5, 'a'), message(6, 'b'), message(7, 'c')]);

    const fetched = await new ImapConnector(client, false).fetchEmails({ ...OPTIONS, limit: 2 });

    expect(fetched.map((email) => email.messageId)).toEqual(['<m6@shop.example>', '<m7@shop.example>']);
    expect(client.calls).toEqual(['connect', 'lock INBOX', 'release', 'logout']);
  });

  it('logs out when the folder cannot be opened', async () => {
    const client = new FakeImapClient([]);

    await expect(new ImapConnector(client, false).fetchEmails({ ...OPTIONS, folder: 'Archive' })).rejects.toThrow(
      'Unknown mailbox: Archive',
    );
    expect(client.calls).toEqual(['connect', 'logout']);
  });

  it('closes the client when the connection fails', async () => {
    const client = new UnreachableImapClient([]);

    await expect(new ImapConnector(client, false).fetchEmails(OPTIONS)).rejects.toThrow('connection refused');
    expect(client.calls).toEqual(['close']);
  });
});

describe('ImapConnector.listFolders', () => {
  it('lists mailbox paths', async () => {
    const client = new FakeImapClient([], ['INBOX', 'Orders']);

    await expect(new ImapConnector(client, false).listFolders()).resolves.toEqual(['INBOX', 'Orders']);
    expect(client.calls).toEqual(['connect', 'logout']);
  });
});
