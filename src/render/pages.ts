/**
 * HTML page shells for the browser views.
 */

import { PasteMetadata, RecentItem } from '../domain/paste';
import { escapeHtml, renderMarkdown } from './markdown';

export function renderPage(title: string, bodyHtml: string): string {
  return (
    '<!doctype html><html><head><meta charset="utf-8">' +
    `<title>${escapeHtml(title)}</title></head><body>${bodyHtml}</body></html>`
  );
}

export function isMarkdown(meta: Pick<PasteMetadata, 'content_type' | 'path'>): boolean {
  return meta.content_type.includes('markdown') || meta.path.endsWith('.md');
}

/** Body of `/p/:id`: rendered markdown, otherwise escaped text in a `<pre>`. */
export function renderPasteBody(meta: PasteMetadata, bytes: Buffer): string {
  const text = bytes.toString('utf8');
  return isMarkdown(meta) ? renderMarkdown(text) : `<pre>${escapeHtml(text)}</pre>`;
}

export function renderDashboard(items: RecentItem[]): string {
  const rows = items.map((item) => {
    const tag = item.tag !== undefined ? ` <small>[${escapeHtml(item.tag)}]</small>` : '';
    const id = escapeHtml(item.id);
    return (
      `<li><a href="/p/${id}">${id}</a>${tag} ` +
      `<code>${escapeHtml(item.commit)}</code> ${item.size} bytes, ${escapeHtml(item.created_at)}</li>`
    );
  });
  const list = rows.length > 0 ? `<ul>${rows.join('')}</ul>` : '<p>No pastes yet.</p>';
  return renderPage('lanpaste', `<h1>Recent pastes</h1>${list}`);
}
