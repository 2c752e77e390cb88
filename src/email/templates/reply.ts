import { escapeHtml, looksLikeHtml } from '../../utils/html.js';

const FOOTER = '<p style="color: #666; font-size: 12px;"><em>This reply was generated automatically.</em></p>';

/** Agent replies are HTML already; plain text gets paragraph markup. */
export function replyTemplate(message: string): string {
  const body = looksLikeHtml(message)
    ? message.trim()
    : message
        .trim()
        .split(/\n\s*\n/)
        .map((paragraph) => `<p>${escapeHtml(paragraph)}</p>`)
        .join('\n');

  return `${body}\n${FOOTER}`;
}
