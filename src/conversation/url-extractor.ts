/**
 * Link and intent detection for mentions.
 */

const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]]+/g;

/** Sentence punctuation that is not part of a link when it ends one */
const TRAILING_PUNCTUATION = new Set(['.', ',', ';', ':', '!', '?', "'"]);

function count(text: string, char: string): number {
  let n = 0;
  for (const c of text) if (c === char) n++;
  return n;
}

function trimTrailing(url: string): string {
  let end = url.length;
  for (;;) {
    const last = url[end - 1];
    if (last === undefined) break;
    if (TRAILING_PUNCTUATION.has(last)) {
      end--;
      continue;
    }
    // Keep a closing paren that balances one inside the link
    if (last === ')' && count(url.slice(0, end), ')') > count(url.slice(0, end), '(')) {
      end--;
      continue;
    }
    break;
  }
  return url.slice(0, end);
}

/**
 * http(s) links in order of appearance.
 */
export function extractUrls(text: string): string[] {
  const urls: string[] = [];
  for (const match of text.matchAll(URL_PATTERN)) {
    const url = trimTrailing(match[0]);
    // "https://" alone is not a link
    if (/^https?:\/\/./.test(url)) urls.push(url);
  }
  return urls;
}

export const SUMMARY_PHRASES = [
  'summarize',
  'summary',
  'tldr',
  'tl;dr',
  'sum up',
  'what does this say',
  "what's this about",
] as const;

/**
 * Whether the text asks for a summary (case-insensitive substring match).
 */
export function hasSummaryIntent(text: string): boolean {
  const normalized = text.toLowerCase().replace(/’/g, "'");
  return SUMMARY_PHRASES.some((phrase) => normalized.includes(phrase));
}
