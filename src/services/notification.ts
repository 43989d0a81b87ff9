// Request Normalizer
//
// Turns an inbound HTTP call into one Notification. Either the body is a JSON object with
// a `message`, or each field is taken from the first of: query parameter, header
// variants, and (message only) the raw body. The topic always comes from the path.

import * as emoji from 'node-emoji';
import { z } from 'zod';
import { PokeErrors } from '../utils/errors';

export interface Notification {
  topic: string;
  title?: string;
  // With the title and tag emoji already applied
  message: string;
  priority?: number;
  tags?: string[];
}

export interface PokeInput {
  // Raw URL path, e.g. /%23ops%3Aexample.org
  path: string;
  query: URLSearchParams;
  headers: Headers;
  body: Uint8Array;
}

export const MIN_PRIORITY = 1;
export const DEFAULT_PRIORITY = 3;
export const MAX_PRIORITY = 5;

// Pokes above this are urgent
export const URGENT_THRESHOLD = 3;

const PRIORITY_NAMES = new Map<string, number>([
  ['min', 1],
  ['low', 2],
  ['default', 3],
  ['high', 4],
  ['urgent', 5],
  ['max', 5],
]);

// Header variants per field, in lookup order
export const FIELD_HEADERS = {
  title: ['x-title', 'title', 'ti', 't'],
  message: ['x-message', 'message', 'm'],
  priority: ['x-priority', 'priority', 'prio', 'p'],
  tags: ['x-tags', 'tags', 'tag', 'ta'],
} as const;

type Field = keyof typeof FIELD_HEADERS;

// Only `message` is required. A null or mistyped optional field is dropped, or read as
// default priority, rather than failing the whole body.
const JsonPokeSchema = z.object({
  message: z.string(),
  title: z.string().nullish().catch(undefined),
  priority: z
    .union([z.number(), z.string()])
    .nullish()
    .catch(DEFAULT_PRIORITY),
  tags: z
    .union([
      z.string().transform(splitTags),
      z.array(z.unknown()).transform((tags) => tags.filter((tag): tag is string => typeof tag === 'string')),
    ])
    .nullish()
    .catch(undefined),
});

function clampPriority(value: number): number {
  return Math.min(MAX_PRIORITY, Math.max(MIN_PRIORITY, Math.trunc(value)));
}

/**
 * Parse a priority given as a number or text. Integers are clamped to 1..5; the names
 * min/low/default/high/urgent/max map to 1/2/3/4/5/5; anything else is 3.
 */
export function parsePriority(value: string | number): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? clampPriority(value) : DEFAULT_PRIORITY;
  }
  const text = value.trim();
  if (/^[+-]?\d+$/.test(text)) {
    return clampPriority(Number(text));
  }
  return PRIORITY_NAMES.get(text.toLowerCase()) ?? DEFAULT_PRIORITY;
}

export function isUrgent(priority: number | undefined): boolean {
  return priority !== undefined && priority > URGENT_THRESHOLD;
}

export function splitTags(value: string): string[] {
  return value.split(',').map((tag) => tag.trim()).filter((tag) => tag.length > 0);
}

// Emoji for each known shortcode, unknown ones dropped
export function tagEmoji(tags: string[]): string {
  return tags
    .map((tag) => emoji.get(tag))
    .filter((glyph): glyph is string => glyph !== undefined)
    .join('');
}

export function decorateMessage(message: string, title?: string, tags?: string[]): string {
  let decorated = message;
  if (title !== undefined) {
    decorated = `**${title}**\n\n${decorated}`;
  }
  if (tags !== undefined) {
    const glyphs = tagEmoji(tags);
    if (glyphs.length > 0) {
      decorated = `${glyphs} ${decorated}`;
    }
  }
  return decorated;
}

// Topic from the URL path; left as is when it is not valid percent-encoding
export function topicFromPath(path: string): string {
  const raw = path.replace(/^\/+/, '');
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

function decodeBody(body: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(body);
  } catch {
    throw PokeErrors.malformedRequest();
  }
}

function parseJsonPoke(text: string): z.infer<typeof JsonPokeSchema> | null {
  if (text.trim().length === 0) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  const result = JsonPokeSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

function lowercaseQuery(query: URLSearchParams): Map<string, string> {
  const params = new Map<string, string>();
  for (const [key, value] of query) {
    const name = key.toLowerCase();
    if (!params.has(name)) {
      params.set(name, value);
    }
  }
  return params;
}

function lookup(field: Field, query: Map<string, string>, headers: Headers): string | undefined {
  const fromQuery = query.get(field);
  if (fromQuery !== undefined) {
    return fromQuery;
  }
  for (const name of FIELD_HEADERS[field]) {
    const value = headers.get(name);
    if (value !== null) {
      return value;
    }
  }
  return undefined;
}

/**
 * Build the Notification for an inbound call.
 * @throws PokeError MALFORMED_REQUEST when the body is not UTF-8
 */
export function normalizeRequest(input: PokeInput): Notification {
  const topic = topicFromPath(input.path);
  const body = decodeBody(input.body);

  let title: string | undefined;
  let message: string;
  let priority: number | undefined;
  let tags: string[] | undefined;

  const json = parseJsonPoke(body);
  if (json) {
    title = json.title ?? undefined;
    message = json.message;
    priority = json.priority !== undefined && json.priority !== null ? parsePriority(json.priority) : undefined;
    tags = json.tags ?? undefined;
  } else {
    const query = lowercaseQuery(input.query);
    title = lookup('title', query, input.headers);
    message = lookup('message', query, input.headers) ?? body;
    const priorityText = lookup('priority', query, input.headers);
    priority = priorityText !== undefined ? parsePriority(priorityText) : undefined;
    const tagsText = lookup('tags', query, input.headers);
    tags = tagsText !== undefined ? splitTags(tagsText) : undefined;
  }

  const notification: Notification = {
    topic,
    message: decorateMessage(message, title, tags),
  };
  if (title !== undefined) notification.title = title;
  if (priority !== undefined) notification.priority = priority;
  if (tags !== undefined) notification.tags = tags;
  return notification;
}
