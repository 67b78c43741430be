/**
 * Reading the translation list out of a chat model reply.
 *
 * Models are asked for a bare JSON array but sometimes fence it in markdown or put a
 * sentence around it.
 */

const FENCE_REGEX = /```(?:json)?[^\S\n]*\n?([\s\S]*?)```/;

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Find the JSON value in a reply: the fenced block if there is one, else the whole reply,
 * else the outermost `[...]` or `{...}` span inside it.
 *
 * @returns the parsed value, undefined when there is none
 */
export function findJsonInReply(reply: string): unknown {
  const fenced = reply.match(FENCE_REGEX);
  const body = (fenced ? fenced[1] : reply).trim();

  const whole = parseJson(body);
  if (whole !== undefined) {
    return whole;
  }

  for (const [open, close] of [['[', ']'], ['{', '}']]) {
    const start = body.indexOf(open);
    const end = body.lastIndexOf(close);
    if (start !== -1 && end > start) {
      const value = parseJson(body.slice(start, end + 1));
      if (value !== undefined) {
        return value;
      }
    }
  }

  return undefined;
}

/**
 * Read a list of translated strings from a model reply.
 * Accepts a bare array or an object with a `translations` array.
 *
 * @returns null when the reply holds no such list
 */
export function parseTranslationList(reply: string): string[] | null {
  const parsed = findJsonInReply(reply);

  const list = Array.isArray(parsed)
    ? parsed
    : typeof parsed === 'object' && parsed !== null && 'translations' in parsed
      ? parsed.translations
      : null;

  if (!Array.isArray(list) || !list.every((item): item is string => typeof item === 'string')) {
    return null;
  }

  return list;
}
