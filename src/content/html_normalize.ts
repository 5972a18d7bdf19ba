import { load } from 'cheerio';

const LONG_SPAN_TEXT = 20;

/**
 * Normalize instructor feedback HTML for the card back.
 *
 * Inline font-family styles are dropped, long spans become paragraphs and
 * short spans lose their attributes.
 */
export function normalizeHtml(html: string): string {
  if (!html.trim()) {
    return '';
  }

  const $ = load(html, null, false);

  $('[style]').each((_, element) => {
    const node = $(element);
    const style = node.attr('style') ?? '';
    if (style.includes('font-family') || style.trim() === '') {
      node.removeAttr('style');
    }
  });

  // Innermost spans first so replacing an outer span keeps its rewritten children
  $('span')
    .toArray()
    .reverse()
    .forEach((element) => {
      const node = $(element);
      const inner = node.html() ?? '';
      node.replaceWith(node.text().trim().length > LONG_SPAN_TEXT ? `<p>${inner}</p>` : `<span>${inner}</span>`);
    });

  return $.html().replace(/\s+>/g, '>').trim();
}
