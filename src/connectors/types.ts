import type { FetchedMailMessage } from '../types.js';

export interface FetchOptions {
  folder: string;
  limit: number;
  criteria: string;
}

export interface MailConnector {
  fetchEmails(options: FetchOptions): Promise<FetchedMailMessage[]>;
}
