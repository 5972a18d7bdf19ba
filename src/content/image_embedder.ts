/**
 * Inline image embedding.
 *
 * Card images are downloaded with the logged-in cookies and rewritten as
 * base64 data URLs so exported cards do not depend on the site staying up.
 */

import { load, type CheerioAPI } from 'cheerio';
import type { HttpClient } from '../fast/http_client';
import { errorMessage } from '../errors';
import { getLogger } from '../logging/logger';
import { isPortraitImage } from './portrait_filter';
import { escapeAttribute } from './text';

const logger = getLogger('images');

/** Image locations on a card page, most specific first */
export const IMAGE_SELECTORS = [
  '#workspace > div.solution.container > div > img',
  '#workspace > div.solution.container > div.options > img',
  '#workspace > div.solution.container img',
  '.question img',
  '.background img',
  '.container.card img',
  'div.solution img',
  'img[src]',
];

export const IMAGE_DOWNLOAD_TIMEOUT_MS = 10000;

const PASSTHROUGH_ATTRIBUTES = ['alt', 'title', 'class', 'style', 'width', 'height'] as const;

export interface PageImage {
  /** Absolute image URL */
  url: string;
  attributes: Partial<Record<(typeof PASSTHROUGH_ATTRIBUTES)[number], string>>;
}

export interface EmbeddedImage {
  url: string;
  mimeType: string;
  dataUrl: string;
}

/**
 * Resolve an img src against the site host.
 */
export function resolveImageUrl(src: string, host: string): string | null {
  try {
    return new URL(src, `${host.replace(/\/$/, '')}/`).toString();
  } catch (error) {
    logger.debug('Unresolvable image URL', { src, host, error: errorMessage(error) });
    return null;
  }
}

/**
 * Map a Content-Type header to the image MIME type used in the data URL.
 * Unknown types are treated as PNG.
 */
export function imageMimeType(contentType: string): string {
  const type = contentType.toLowerCase();
  if (type.includes('image/png')) return 'image/png';
  if (type.includes('image/jpeg') || type.includes('image/jpg')) return 'image/jpeg';
  if (type.includes('image/gif')) return 'image/gif';
  if (type.includes('image/svg')) return 'image/svg+xml';
  if (type.includes('image/webp')) return 'image/webp';
  return 'image/png';
}

/**
 * Find the page's images in selector priority order, deduplicated by URL,
 * with portraits and logos removed.
 */
export function collectPageImages($: CheerioAPI, host: string): PageImage[] {
  const images: PageImage[] = [];
  const seen = new Set<string>();

  for (const selector of IMAGE_SELECTORS) {
    $(selector).each((_, element) => {
      const img = $(element);
      const src = img.attr('src');
      if (!src || src.startsWith('data:') || seen.has(src)) {
        return;
      }
      seen.add(src);

      if (isPortraitImage(src, img.attr('alt') ?? '', img.attr('title') ?? '', img.attr('class') ?? '')) {
        logger.debug('Filtered portrait image', { src });
        return;
      }

      const url = resolveImageUrl(src, host);
      if (!url) {
        return;
      }

      const attributes: PageImage['attributes'] = {};
      for (const name of PASSTHROUGH_ATTRIBUTES) {
        const value = img.attr(name);
        if (value) {
          attributes[name] = value;
        }
      }
      images.push({ url, attributes });
    });
  }

  return images;
}

/**
 * Download one image. Failures are logged and reported as null.
 */
export async function downloadImage(client: HttpClient, url: string): Promise<EmbeddedImage | null> {
  try {
    const response = await client.get(url, { timeoutMs: IMAGE_DOWNLOAD_TIMEOUT_MS, accept: 'image/*,*/*;q=0.8' });
    if (response.status !== 200) {
      logger.debug('Image download failed', { url, status: response.status });
      return null;
    }
    const mimeType = imageMimeType(response.contentType);
    return {
      url,
      mimeType,
      dataUrl: `data:${mimeType};base64,${response.body.toString('base64')}`,
    };
  } catch (error) {
    logger.debug('Image download failed', { url, error: errorMessage(error) });
    return null;
  }
}

function renderImageTag(dataUrl: string, attributes: PageImage['attributes']): string {
  const extra = PASSTHROUGH_ATTRIBUTES.filter((name) => attributes[name] !== undefined)
    .map((name) => ` ${name}="${escapeAttribute(attributes[name] ?? '')}"`)
    .join('');
  return `<img src="${dataUrl}"${extra}>`;
}

/**
 * Download every usable image on a card page and return them as one
 * embedded-images block, or an empty string when there are none.
 */
export async function extractPageImages(html: string, client: HttpClient, host: string): Promise<string> {
  const images = collectPageImages(load(html), host);
  const tags: string[] = [];

  for (const image of images) {
    const embedded = await downloadImage(client, image.url);
    if (embedded) {
      tags.push(renderImageTag(embedded.dataUrl, image.attributes));
    }
  }

  if (tags.length === 0) {
    return '';
  }
  logger.debug('Embedded page images', { count: tags.length });
  return `<div class="extracted-images">${tags.join('')}</div>`;
}

/**
 * Rewrite the img tags of an HTML fragment to data URLs. Images that fail to
 * download keep their original src.
 */
export async function embedImagesInHtml(html: string, client: HttpClient, host: string): Promise<string> {
  if (!html.includes('<img')) {
    return html;
  }

  const $ = load(html, null, false);
  const images = $('img[src]').toArray();

  for (const element of images) {
    const img = $(element);
    const src = img.attr('src');
    if (!src || src.startsWith('data:')) {
      continue;
    }
    const url = resolveImageUrl(src, host);
    if (!url) {
      continue;
    }
    const embedded = await downloadImage(client, url);
    if (embedded) {
      img.attr('src', embedded.dataUrl);
    }
  }

  return $.html();
}
