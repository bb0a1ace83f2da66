/**
 * Shared JSON parse that strips markdown fences and normalizes quotes.
 * Used on LLM output by the scoping and community workers.
 */
import { componentLogger } from '@/services/logger';

const log = componentLogger('json');

function stripFences(raw: string): string {
  let txt = raw.trim();

  if (txt.startsWith('```')) {
    const firstNewline = txt.indexOf('\n');
    const lastFence = txt.lastIndexOf('```');
    if (firstNewline !== -1 && lastFence !== -1 && lastFence > firstNewline) {
      txt = txt.slice(firstNewline + 1, lastFence).trim();
    } else {
      txt = txt.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
    }
  }
  return txt;
}

function tryParse(txt: string): unknown {
  try {
    return JSON.parse(txt);
  } catch {
    return undefined;
  }
}

/** Returns the parsed object, or null when the text holds no JSON object. */
export function safeParseJson(raw: string, context: string): Record<string, unknown> | null {
  const txt = stripFences(raw);

  const parsed = tryParse(txt) ?? tryParse(txt.replace(/'/g, '"'));
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }

  log.warn('safeParseJson:parse_error', { context, raw: txt.slice(0, 300) });
  return null;
}
