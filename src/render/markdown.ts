/**
 * Markdown to HTML for the paste view.
 *
 * Raw HTML in the source is shown as text, and links or images pointing at
 * script-capable URL schemes lose their target.
 */

import { Marked } from 'marked';

const UNSAFE_URL = /^\s*(javascript|vbscript|data):/i;

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function isUnsafeUrl(href: string): boolean {
  return UNSAFE_URL.test(href);
}

const markdown = new Marked({
  gfm: true,
  renderer: {
    html(html: string): string {
      return escapeHtml(html);
    },
    link(href: string, _title: string | null | undefined, text: string): string | false {
      return isUnsafeUrl(href) ? text : false;
    },
    image(href: string, _title: string | null, text: string): string | false {
      return isUnsafeUrl(href) ? escapeHtml(text) : false;
    },
  },
});

export function renderMarkdown(source: string): string {
  return markdown.parser(markdown.lexer(source));
}
