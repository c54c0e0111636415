import * as cheerio from 'cheerio';
import { HttpClient } from '../core/HttpClient';
import { buildListingId, resolveListingUrl } from '../core/ListingId';
import { FetchError } from '../core/errors';
import { StructuredLogger } from '../core/StructuredLogger';
import { missingKeywords } from '../filters/keywordFilter';
import { Listing } from '../types/listing';
import { ListingBatch, ListingSource } from './ListingSource';

export interface OlxSourceOptions {
  queries: string[];
  baseUrl: string;
  /** Lowercase keywords that must all appear in a title */
  keywords: string[];
}

export interface ParseContext {
  baseUrl: string;
  query: string;
  seenAt: string;
}

const CARD_SELECTOR = "div[data-cy='l-card']";
const TITLE_CONTAINER_SELECTOR = "div[data-cy='ad-card-title']";
const PRICE_SELECTOR = "p[data-testid='ad-price']";

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Extracts listing cards from an OLX search results page. Cards without a
 * title or a link are dropped.
 */
export function parseOlxListings(html: string, ctx: ParseContext): Listing[] {
  const $ = cheerio.load(html);
  const listings: Listing[] = [];

  $(CARD_SELECTOR).each((_, element) => {
    const $card = $(element);
    const $titleContainer = $card.find(TITLE_CONTAINER_SELECTOR).first();

    let title = '';
    let href = '';
    let price = '';

    if ($titleContainer.length > 0) {
      const $heading = $titleContainer.find('h4').first();
      title = cleanText(($heading.length > 0 ? $heading : $titleContainer.find('h3').first()).text());
      href = $titleContainer.find('a[href]').first().attr('href') || '';
      price = cleanText($card.find(PRICE_SELECTOR).first().text());
    } else {
      // Markup without the title container: fall back on structure
      title = cleanText($card.find('h4, h3, h6').first().text());
      $card.find('a[href]').each((__, anchor) => {
        const candidate = $(anchor).attr('href') || '';
        if (candidate.startsWith('/d/') || candidate.startsWith('http')) {
          href = candidate;
          return false;
        }
        return undefined;
      });
      const $price = $card.find(PRICE_SELECTOR).first();
      price = cleanText(($price.length > 0 ? $price : $card.find('p').first()).text());
    }

    if (!title || !href) {
      return;
    }

    const url = resolveListingUrl(href, ctx.baseUrl);
    if (!url) {
      return;
    }

    listings.push({
      id: buildListingId($card.attr('id'), href, ctx.baseUrl),
      title,
      price: price || 'N/A',
      url,
      seenAt: ctx.seenAt,
      query: ctx.query
    });
  });

  return listings;
}

export class OlxSource implements ListingSource {
  readonly name = 'olx';
  private readonly logger: StructuredLogger;

  constructor(
    private readonly http: HttpClient,
    private readonly options: OlxSourceOptions,
    logger: StructuredLogger
  ) {
    this.logger = logger.child('olx');
  }

  async fetchPage(url: string): Promise<string> {
    const response = await this.http.getText(url, {
      headers: { Accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8' }
    });
    return response.data;
  }

  /**
   * Fetches every search page. A failing page is logged and skipped; only
   * when all of them fail is the batch reported as a FetchError.
   */
  async fetchListings(): Promise<ListingBatch> {
    const listings: Listing[] = [];
    const failedQueries: string[] = [];
    let parsed = 0;
    let lastError: unknown;

    for (const query of this.options.queries) {
      this.logger.info('Fetching search page', { url: query });
      this.logger.startTimer(query);

      let html: string;
      try {
        html = await this.fetchPage(query);
      } catch (error) {
        lastError = error;
        failedQueries.push(query);
        this.logger.error('Failed to fetch search page', error, { url: query });
        continue;
      }

      const cards = parseOlxListings(html, {
        baseUrl: this.options.baseUrl,
        query,
        seenAt: new Date().toISOString()
      });
      parsed += cards.length;

      if (cards.length === 0) {
        this.logger.warn('No listing cards found, the page layout may have changed', { url: query });
      }

      let matched = 0;
      for (const card of cards) {
        const missing = missingKeywords(card.title, this.options.keywords);
        if (missing.length > 0) {
          this.logger.debug('Skipped ad missing keywords', { missing, title: card.title });
          continue;
        }
        listings.push(card);
        matched++;
      }

      this.logger.endTimer(query, `Parsed ${cards.length} ads, ${matched} match keywords`, { url: query });
    }

    if (this.options.queries.length > 0 && failedQueries.length === this.options.queries.length) {
      throw new FetchError(
        `All ${failedQueries.length} search page(s) failed`,
        failedQueries[0],
        lastError
      );
    }

    return { listings, parsed, failedQueries };
  }
}
