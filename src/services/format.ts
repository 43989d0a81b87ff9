// Message content formatting

import { marked } from 'marked';
import type { TextMessageContent } from '../types';

export type MessageFormat = 'markdown' | 'plain';

export const DEFAULT_FORMAT: MessageFormat = 'markdown';

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderMarkdown(text: string): string {
  return marked.parser(marked.lexer(text)).trim();
}

export function textPlain(body: string): TextMessageContent {
  return { msgtype: 'm.text', body };
}

// formatted_body is only added when the markdown changes something
export function textMarkdown(body: string): TextMessageContent {
  const html = renderMarkdown(body);
  if (html === `<p>${escapeHtml(body)}</p>`) {
    return textPlain(body);
  }
  return {
    msgtype: 'm.text',
    body,
    format: 'org.matrix.custom.html',
    formatted_body: html,
  };
}

/**
 * Pick the format: explicit per-call value, then the configured default, then markdown.
 * Unknown names are logged and treated as markdown.
 */
export function chooseFormat(requested: string | null | undefined, configured: string | undefined): MessageFormat {
  const format = requested ?? configured ?? DEFAULT_FORMAT;
  switch (format.toLowerCase()) {
    case 'markdown':
      return 'markdown';
    case 'plain':
      return 'plain';
    default:
      console.warn('[Format] Unknown format, using markdown', { format });
      return 'markdown';
  }
}

export function formatMessage(text: string, format: MessageFormat, mentionRoom: boolean): TextMessageContent {
  const content = format === 'plain' ? textPlain(text) : textMarkdown(text);
  if (mentionRoom) {
    content['m.mentions'] = { room: true };
  }
  return content;
}
