/**
 * Boilerplate-free text extraction for fetched article pages
 */

import { load } from 'cheerio';

const BOILERPLATE_SELECTORS = 'script, style, noscript, nav, footer, header';
const BLOCK_SELECTORS = 'p, div, li, br, tr, h1, h2, h3, h4, h5, h6, section, article, blockquote, pre, figcaption';
// Not whitespace, so it survives whitespace collapsing
const BLOCK_BREAK = '\u241E';

/**
 * Strip scripts, styles and site chrome, then return the remaining body text
 * with one block element's text per line. Returns an empty string when nothing is left.
 */
export function extractArticleText(html: string): string {
  const $ = load(html);

  $(BOILERPLATE_SELECTORS).remove();
  $(BLOCK_SELECTORS).after(BLOCK_BREAK);

  return $('body')
    .text()
    .split(BLOCK_BREAK)
    .map(line => line.replace(/\s+/g, ' ').trim())
    .filter(line => line.length > 0)
    .join('\n');
}
