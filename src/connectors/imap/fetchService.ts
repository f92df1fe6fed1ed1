import { logger } from '../../logger.js';
import type { EmailProcessingService } from '../../pipeline/processEmail.js';
import type { ParsedEmail } from '../../types.js';
import type { FetchOptions, MailConnector } from '../types.js';

export class ImapFetchService {
  constructor(
    private readonly connector: MailConnector,
    private readonly processor: EmailProcessingService,
  ) {}

  async fetchAndParse(options: FetchOptions): Promise<ParsedEmail[]> {
    const fetched = await this.connector.fetchEmails(options);
    const parsed = await this.processor.processMessages(fetched);

    logger.info({ folder: options.folder, fetched: fetched.length, parsed: parsed.length }, 'IMAP fetch completed');
    return parsed;
  }
}
