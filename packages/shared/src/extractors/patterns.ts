/**
 * Contract Extraction Patterns
 *
 * Default pattern tables for the rule-based extractor. Tables are frozen
 * and passed to the extractor at construction; pass an alternate table to
 * change recognition without touching the matchers.
 *
 * Flags written here do not matter to the matchers: buildFieldRules copies
 * every pattern with or without /g depending on whether it is iterated.
 */

import type { ContractPatternTables } from './types';

const MONTHS =
  'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

const FULL_MONTHS =
  'January|February|March|April|May|June|July|August|September|October|November|December';

/**
 * Where the second name of a "between X and Y" clause stops
 */
const PARTY_TAIL =
  "(?=\\s+(?:on|dated|effective|as\\s+of|for|with|under|each|collectively|hereinafter|whose|which|who|that|a|an)\\b|\\s*[,;:(\\n]|\\.(?:\\s|$)|$)";

/** Title-case "And" stays part of names such as "Smith And Sons" */
const PARTY_CONJUNCTION = '(?:and|AND|&)';

const PARTY_NAME = "[A-Z][\\w&.,'\\- ]*?";
const SECOND_PARTY_NAME = "[A-Z][\\w&.'\\- ]*?";

const JURISDICTION_PREFIX =
  '(?:(?:State|Commonwealth|Province|Republic|Kingdom)\\s+of\\s+)?';

export const DEFAULT_PATTERN_TABLES = deepFreeze<ContractPatternTables>({
  parties: {
    templates: [
      // "between Acme Corp and Beta LLC", "BETWEEN ACME CORP AND BETA LLC"
      new RegExp(`\\b(?:[Bb]etween|BETWEEN)\\s+(${PARTY_NAME})\\s+${PARTY_CONJUNCTION}\\s+(${SECOND_PARTY_NAME})${PARTY_TAIL}`, 'g'),
      // "entered into by Acme Corp and Beta LLC"
      new RegExp(`\\b(?:entered\\s+into\\s+by|ENTERED\\s+INTO\\s+BY)\\s+(${PARTY_NAME})\\s+${PARTY_CONJUNCTION}\\s+(${SECOND_PARTY_NAME})${PARTY_TAIL}`, 'g'),
      // "PARTY A: Acme Corp", "Party 1: Acme Corp"
      /\bPARTY\s+(?:A|B|1|2|ONE|TWO)\s*:\s*([A-Z][^\n]*?)[ \t]*(?=\r?\n|$)/gi,
      // "Client: Acme Corp"
      /^[ \t]*(?:Client|Customer|Vendor|Supplier|Contractor|Provider|Licensor|Licensee|Buyer|Seller)\s*:\s*([A-Z][^\n]*?)[ \t]*(?=\r?\n|$)/gim,
    ],
    scanLength: 2000,
    maxParties: 5,
    minNameLength: 2,
  },

  effectiveDate: {
    anchors: /\b(?:effective|dated?|entered\s+into|as\s+of)\b/gi,
    formats: [
      // 01/02/2024, 1-2-24
      /\b\d{1,2}[/-]\d{1,2}[/-]\d{2,4}\b/,
      // January 1, 2024 / Jan. 1st 2024
      new RegExp(`\\b(?:${MONTHS})\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}\\b`),
      // 1 January 2024 / 1st day of January, 2024
      new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+(?:day\\s+of\\s+)?(?:${FULL_MONTHS}),?\\s+\\d{4}\\b`),
    ],
    scanLength: 2000,
    windowLength: 200,
  },

  term: {
    patterns: [
      /\b(?:term|duration)\b[^.\n]{0,80}?\b(\d+\s+(?:day|month|year)s?)\b/i,
      /\bfor\s+a\s+period\s+of\s+(\d+\s+(?:day|month|year)s?)\b/i,
    ],
    scanLength: 3000,
  },

  governingLaw: {
    anchor: /governing\s+law/i,
    jurisdiction: new RegExp(
      '^\\s*(?:[:.\\-\\u2013\\u2014]\\s*)?' +
        '(?:(?:shall\\s+be|is|will\\s+be)\\s+)?' +
        '(?:(?:governed\\s+by|construed\\s+under|construed\\s+in\\s+accordance\\s+with)\\s+)?' +
        '(?:the\\s+)?(?:laws?\\s+of\\s+)?(?:the\\s+)?' +
        JURISDICTION_PREFIX +
        '([A-Z][A-Za-z]+(?:[ \\t]+(?:of[ \\t]+)?[A-Z][A-Za-z]+)*)'
    ),
    governedBy: new RegExp(
      '\\b[Gg]overned\\s+by[^.]{0,80}?\\b[Ll]aws?\\s+of\\s+(?:the\\s+)?' +
        JURISDICTION_PREFIX +
        '([A-Z][A-Za-z]+(?:[ \\t]+[A-Z][A-Za-z]+)*)'
    ),
    rejectedLeadWords: ['This', 'The', 'These', 'Each', 'Any', 'All', 'Both', 'Either', 'Neither', 'Agreement', 'Section'],
    windowLength: 200,
  },

  sections: {
    anchors: {
      payment_terms: [/\bpayment\s+terms?\b/i, /\bpayments?\b/i, /\bcompensation\b/i, /\binvoices?\b/i],
      termination: [/\btermination\b/i, /\bterminate[sd]?\b/i, /\bcancell?ation\b/i],
      auto_renewal: [/\bauto(?:matic(?:ally)?)?[\s-]*renew/i, /\brenew(?:al|als|s|ed)?\b/i],
      confidentiality: [/\bconfidential(?:ity)?\b/i, /\bnon-?disclosure\b/i],
      indemnity: [/\bindemnif/i, /\bindemnit/i, /\bhold\s+harmless\b/i],
    },
    maxLength: 500,
  },

  liabilityCap: {
    anchor: /\bliab(?:ility|ilities|le)\b/gi,
    // An amount followed by more digits (1.000.000,00) is not read at all
    amount: /(USD|EUR|GBP|US\$|\$|€|£)\s?(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)(?![.,]?\d)/gi,
    currencies: {
      USD: 'USD',
      'US$': 'USD',
      $: 'USD',
      EUR: 'EUR',
      '€': 'EUR',
      GBP: 'GBP',
      '£': 'GBP',
    },
    windowAfter: 200,
    windowBefore: 100,
  },

  signatories: {
    patterns: [
      // Name: Jane Doe
      // Title: Chief Executive Officer
      {
        pattern: /\bName\s*:\s*([A-Z][A-Za-z.'-]*(?:[ \t]+[A-Z][A-Za-z.'-]*)+)[ \t]*\r?\n\s*Title\s*:\s*([A-Z][^\n]*?)[ \t]*(?=\r?\n|$)/g,
        requireTitleKeyword: false,
      },
      // By: Jane Doe, Chief Executive Officer
      {
        pattern: /\bBy\s*:\s*([A-Z][A-Za-z.'-]*(?:[ \t]+[A-Z][A-Za-z.'-]*)+)[ \t]*,[ \t]*([A-Z][A-Za-z&.' -]*?)[ \t]*(?=\r?\n|$)/g,
        requireTitleKeyword: false,
      },
      // Jane Doe, Chief Executive Officer
      {
        pattern: /^[ \t]*([A-Z][a-z]+(?:[ \t]+[A-Z]\.)?(?:[ \t]+[A-Z][a-z'-]+)+)[ \t]*,[ \t]*([A-Z][A-Za-z&.'-]*(?:[ \t]+(?:of|and|&|[A-Z][A-Za-z&.'-]*))*)[ \t]*$/gm,
        requireTitleKeyword: true,
      },
    ],
    titleKeywords:
      /\b(?:Officer|President|Director|Manager|Partner|Owner|Founder|CEO|CFO|COO|CTO|Secretary|Treasurer|Counsel|Head|Chair(?:man|woman|person)?|Principal|Member|Trustee|Agent|Lead|VP|Signatory|Representative)\b/,
    windowLength: 1500,
  },
});

/**
 * Freeze a table and everything it contains except the RegExp objects.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !(value instanceof RegExp)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Build an alternate table from the defaults. Overrides replace whole
 * sections.
 */
export function createPatternTables(
  overrides: Partial<ContractPatternTables> = {}
): ContractPatternTables {
  return deepFreeze({ ...DEFAULT_PATTERN_TABLES, ...overrides });
}
