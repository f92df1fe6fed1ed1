import type { SearchObject } from 'imapflow';

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

const FLAG_KEYWORDS: Record<string, SearchObject> = {
  ALL: { all: true },
  SEEN: { seen: true },
  UNSEEN: { seen: false },
  FLAGGED: { flagged: true },
  UNFLAGGED: { flagged: false },
  ANSWERED: { answered: true },
  UNANSWERED: { answered: false },
};

const TEXT_KEYWORDS: Record<string, 'from' | 'to' | 'subject' | 'body'> = {
  FROM: 'from',
  TO: 'to',
  SUBJECT: 'subject',
  BODY: 'body',
};

const DATE_KEYWORDS: Record<string, 'since' | 'before' | 'on'> = {
  SINCE: 'since',
  BEFORE: 'before',
  ON: 'on',
};

function tokenize(criteria: string): string[] {
  return (criteria.match(/"[^"]*"|\S+/g) ?? []).map((token) => token.replace(/^"(.*)"$/, '$1'));
}

/** Accepts IMAP dates (`05-Jan-2024`) and ISO dates (`2024-01-05`). */
export function parseSearchDate(value: string): Date {
  const imap = /^(\d{1,2})-([A-Za-z]{3})-(\d{4})$/.exec(value);
  if (imap) {
    const month = MONTHS.indexOf(imap[2].toLowerCase());
    if (month >= 0) {
      return new Date(Date.UTC(Number(imap[3]), month, Number(imap[1])));
    }
  }

  if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    const parsed = new Date(`${value}T00:00:00Z`);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }

  throw new Error(`Invalid search date: ${value}`);
}

/**
 * Translates an IMAP SEARCH string such as `UNSEEN FROM "shop@example.com"` into an
 * imapflow search object. Keywords combine with AND.
 */
export function parseSearchCriteria(criteria: string): SearchObject {
  const tokens = tokenize(criteria);
  if (!tokens.length) {
    return { all: true };
  }

  const query: SearchObject = {};
  for (let i = 0; i < tokens.length; i += 1) {
    const keyword = tokens[i].toUpperCase();

    const flag = FLAG_KEYWORDS[keyword];
    if (flag) {
      Object.assign(query, flag);
      continue;
    }

    const textKey = TEXT_KEYWORDS[keyword];
    const dateKey = DATE_KEYWORDS[keyword];
    if (!textKey && !dateKey) {
      throw new Error(`Unsupported search keyword: ${tokens[i]}`);
    }

    const argument = tokens[i + 1];
    if (argument === undefined) {
      throw new Error(`Search keyword ${keyword} needs a value`);
    }
    i += 1;

    if (textKey) {
      query[textKey] = argument;
    } else if (dateKey) {
      query[dateKey] = parseSearchDate(argument);
    }
  }

  return query;
}
