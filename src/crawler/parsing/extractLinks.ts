import { load } from 'cheerio';
import type { Element as CheerioElement } from 'domhandler';

const DESCRIPTION_LINK_SELECTOR = 'div#id_description > p > a';
const ORIGINAL_WRITEUP_MARKER = 'Original writeup';

export interface DetailLinks {
  inlineLink?: string;
  fallbackLink?: string;
}

/**
 * Pulls the two candidate write-up links out of a detail page: the first link
 * in the description body, and the "Original writeup" link. Either may be
 * missing.
 */
export function extractLinks(html: string): DetailLinks {
  const $ = load(html);
  const links: DetailLinks = {};

  const inlineLink = nonEmpty($(DESCRIPTION_LINK_SELECTOR).first().attr('href'));
  if (inlineLink) {
    links.inlineLink = inlineLink;
  }

  const marker = $('a')
    .filter((_idx: number, element: CheerioElement) => $(element).text() === ORIGINAL_WRITEUP_MARKER)
    .first();
  const fallbackLink = nonEmpty(marker.attr('href'));
  if (fallbackLink) {
    links.fallbackLink = fallbackLink;
  }

  return links;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
