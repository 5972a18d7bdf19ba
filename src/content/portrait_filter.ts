/**
 * Portrait vs medical image classification.
 *
 * The site decorates cards with staff headshots, avatars and logos next to
 * the clinical images that matter. Anything that looks like a person or a
 * piece of UI is dropped; anything that mentions medical content is kept.
 */

import { load } from 'cheerio';
import { getKeywordTable, matchingKeywords, type KeywordTable } from './keyword_tables';

export interface ImageDescriptor {
  src?: string;
  alt?: string;
  title?: string;
  className?: string;
}

export type PortraitVerdict =
  | 'medical'
  | 'ui'
  | 'portrait-keyword'
  | 'portrait-filename'
  | 'portrait-path'
  | 'person-title'
  | 'educational'
  | 'uncertain';

const KEPT_VERDICTS: ReadonlySet<PortraitVerdict> = new Set(['medical', 'educational']);

/**
 * Decide why an image would be kept or filtered. Checks run in strict
 * priority order and the first one that matches decides; a medical keyword
 * anywhere wins over every other signal.
 */
export function classifyImage(image: ImageDescriptor, table: KeywordTable = getKeywordTable()): PortraitVerdict {
  const src = (image.src ?? '').toLowerCase();
  const allText = [src, image.alt ?? '', image.title ?? '', image.className ?? ''].join(' ').toLowerCase();
  const words = table.image;

  if (matchingKeywords(allText, words.medical).length > 0) return 'medical';
  if (matchingKeywords(allText, words.ui).length > 0) return 'ui';
  if (matchingKeywords(allText, words.portrait).length > 0) return 'portrait-keyword';

  if (words.imageExtensions.some((ext) => src.includes(ext))) {
    if (
      words.portraitDirectories.some((word) => src.includes(word)) ||
      words.portraitFileWords.some((word) => src.includes(word))
    ) {
      return 'portrait-filename';
    }
  }

  if (words.portraitPaths.some((path) => src.includes(path))) return 'portrait-path';
  if (words.titleWords.some((word) => allText.includes(word))) return 'person-title';
  if (words.educational.some((word) => allText.includes(word))) return 'educational';

  // Fail closed
  return 'uncertain';
}

/**
 * Whether an image is likely a portrait, logo or other non-clinical image
 * that should be filtered out.
 */
export function isPortraitImage(src: string, alt: string, title = '', className = ''): boolean {
  return !KEPT_VERDICTS.has(classifyImage({ src, alt, title, className }));
}

/**
 * Strip portraits from an HTML fragment: portrait containers, SVGs that look
 * like drawings of people, and img tags the classifier rejects.
 */
export function cleanPortraits(html: string, table: KeywordTable = getKeywordTable()): string {
  if (!html) {
    return html;
  }

  const $ = load(html, null, false);

  $('div[class*="portrait"]').remove();

  $('svg').each((_, svg) => {
    const markup = $.html(svg).toLowerCase();
    const portraitCount = matchingKeywords(markup, table.svg.portrait).length;
    const medicalCount = matchingKeywords(markup, table.svg.medical).length;
    if (portraitCount > 0 && medicalCount < portraitCount * 2) {
      $(svg).remove();
    }
  });

  $('img').each((_, img) => {
    const element = $(img);
    const portrait = !KEPT_VERDICTS.has(
      classifyImage(
        {
          src: element.attr('src'),
          alt: element.attr('alt'),
          title: element.attr('title'),
          className: element.attr('class'),
        },
        table
      )
    );
    if (portrait) {
      element.remove();
    }
  });

  return $.html();
}
