const INTEGER = /^\s*[+-]?\d+\s*$/;

function toIndex(token: string): number | null {
  return INTEGER.test(token) ? Number.parseInt(token, 10) - 1 : null;
}

/**
 * Parses a 1-based page expression such as "1-3,5,7-9" into zero-based
 * page indices for a document of `totalPages` pages.
 *
 * Tokens contribute in the order they appear; duplicates are kept.
 * Out-of-range single pages and unparseable tokens are skipped, and ranges are
 * clamped to the document. An empty result means the expression selected
 * nothing, which callers report as an invalid range.
 */
export function parsePageRange(expression: string, totalPages: number): number[] {
  const pages: number[] = [];

  for (const rawToken of expression.split(',')) {
    const token = rawToken.trim();
    const dash = token.indexOf('-');

    if (dash !== -1) {
      const start = toIndex(token.slice(0, dash));
      const end = toIndex(token.slice(dash + 1));
      if (start === null || end === null) continue;

      const low = Math.max(0, start);
      const high = Math.min(totalPages - 1, end);
      for (let page = low; page <= high; page++) {
        pages.push(page);
      }
      continue;
    }

    const page = toIndex(token);
    if (page !== null && page >= 0 && page < totalPages) {
      pages.push(page);
    }
  }

  return pages;
}
