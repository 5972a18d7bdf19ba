/**
 * Small text helpers shared by the HTML builders.
 */

export const collapseText = (value: string): string => value.replace(/\s+/g, ' ').trim();

export const escapeHtml = (value: string): string =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

export const escapeAttribute = (value: string): string => escapeHtml(value).replace(/"/g, '&quot;');

/** Strip tags and collapse whitespace; for length checks and log previews. */
export const stripTags = (html: string): string => collapseText(html.replace(/<[^>]+>/g, ' '));
