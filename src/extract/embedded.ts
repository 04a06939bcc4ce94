/**
 * Locate and decode JSON documents embedded in search result pages
 */

const XSSI_PREFIX = ")]}'";

interface EmbeddedPattern {
  name: string;
  marker: RegExp;
}

// Each marker ends right before the opening bracket of the embedded document
const PATTERNS: readonly EmbeddedPattern[] = [
  { name: 'AF_initDataCallback', marker: /AF_initDataCallback\s*\([^}]*?data\s*:\s*(?=\[)/ },
  { name: '__INITIAL_STATE__', marker: /window\.__INITIAL_STATE__\s*=\s*(?=\{)/ },
];

export interface EmbeddedScan {
  payloads: unknown[];
  failures: string[];
}

/**
 * Return the balanced [...] or {...} starting at `start`, honouring string literals
 */
export function sliceBalanced(text: string, start: number): string | null {
  const open = text[start];
  if (open !== '[' && open !== '{') {
    return null;
  }

  const stack: string[] = [];
  let quote: string | null = null;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') {
        i++;
      } else if (ch === quote) {
        quote = null;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '[' || ch === '{') {
      stack.push(ch === '[' ? ']' : '}');
    } else if (ch === ']' || ch === '}') {
      if (stack.pop() !== ch) {
        return null;
      }
      if (stack.length === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return null;
}

function parseLenient(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // some pages embed single-quoted literals
    return JSON.parse(raw.replace(/'/g, '"'));
  }
}

/**
 * Find embedded payloads. A body that is itself JSON (optionally behind an
 * anti-hijacking prefix) is returned as the only payload; otherwise the first
 * match of every known marker is decoded.
 */
export function findEmbeddedPayloads(body: string): EmbeddedScan {
  const failures: string[] = [];
  const trimmed = body.trimStart();
  const direct = trimmed.startsWith(XSSI_PREFIX) ? trimmed.slice(XSSI_PREFIX.length).trimStart() : trimmed;

  if (direct.startsWith('[') || direct.startsWith('{')) {
    try {
      return { payloads: [JSON.parse(direct)], failures };
    } catch (error) {
      failures.push(`body: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const payloads: unknown[] = [];
  for (const pattern of PATTERNS) {
    const match = pattern.marker.exec(body);
    if (!match) {
      continue;
    }
    const raw = sliceBalanced(body, match.index + match[0].length);
    if (raw === null) {
      failures.push(`${pattern.name}: unbalanced document`);
      continue;
    }
    try {
      payloads.push(parseLenient(raw));
    } catch (error) {
      failures.push(`${pattern.name}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return { payloads, failures };
}
