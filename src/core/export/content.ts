// src/core/export/content.ts
import * as cheerio from 'cheerio';

/**
 * Plain-text rendering of a post's HTML body.
 * Paragraphs are separated by a blank line, <br> becomes a newline.
 */
export function htmlToText(html: string): string {
  if (html.trim() === '') return '';

  const $ = cheerio.load(html, null, false);
  $('br').replaceWith('\n');

  const paragraphs = $('p')
    .toArray()
    .map(p => $(p).text().trim())
    .filter(text => text.length > 0);

  if (paragraphs.length > 0) {
    return paragraphs.join('\n\n');
  }

  return $.root().text().trim();
}
