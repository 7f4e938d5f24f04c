/**
 * ListingSync: Browse Page Parser
 *
 * Default ListingParser for the tracker's browse table (table#torrents).
 * Each row is parsed independently; rows that cannot be read are skipped.
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { Listing, ListingParser } from '../types';
import { matchRelativeAge } from '../lib/relative-time';
import { logger, errorMessage } from '../lib/logger';

const SIZE_PATTERN = /([\d.]+)\s*(GB|MB|TB)/i;
const TORRENT_ID_PATTERN = /\/t\/(\d+)/;

export class HtmlListingParser implements ListingParser {
  private readonly log = logger.child({ component: 'HtmlListingParser' });

  constructor(private readonly baseUrl: string) {}

  parse(html: string, category: string, fetchedAt: Date = new Date()): Listing[] {
    const $ = cheerio.load(html);
    const table = $('table#torrents');

    if (table.length === 0) {
      this.log.warn('Listing table not found', { category });
      return [];
    }

    const listings: Listing[] = [];
    let skipped = 0;

    // First row is the header
    table.find('tr').slice(1).each((_, row) => {
      try {
        const listing = this.parseRow($, row, category, fetchedAt);
        if (listing) {
          listings.push(listing);
        } else {
          skipped++;
        }
      } catch (error) {
        skipped++;
        this.log.debug('Row parse failed', {
          category,
          error: errorMessage(error),
        });
      }
    });

    if (skipped > 0) {
      this.log.debug('Skipped unreadable rows', { category, skipped });
    }

    return listings;
  }

  private parseRow(
    $: cheerio.CheerioAPI,
    row: Element,
    category: string,
    fetchedAt: Date
  ): Listing | null {
    const $row = $(row);
    const cells = $row.find('td');
    if (cells.length < 5) return null;

    const titleLink = $row
      .find('a[href*="/t/"]')
      .filter((_, a) => {
        const href = $(a).attr('href') ?? '';
        return !href.includes('bookmark') && !href.includes('comment');
      })
      .first();

    const href = titleLink.attr('href');
    const idMatch = href ? TORRENT_ID_PATTERN.exec(href) : null;
    if (!idMatch) return null;

    const id = idMatch[1];
    const name = titleLink.text().trim();
    if (!name) return null;

    const downloadHref = $row.find('a[href*="/download.php/"]').first().attr('href');
    const rowText = $row.text();

    // Seeders, leechers, snatched are the last three purely numeric cells
    const numbers: number[] = [];
    cells.each((_, cell) => {
      const text = $(cell).text().trim();
      if (/^\d+$/.test(text)) {
        numbers.push(Number.parseInt(text, 10));
      }
    });

    const age = matchRelativeAge(rowText, fetchedAt);

    return {
      id,
      name,
      category,
      size: SIZE_PATTERN.exec(rowText)?.[0] ?? 'Unknown',
      seeders: numbers.length >= 3 ? numbers[numbers.length - 3] : 0,
      leechers: numbers.length >= 2 ? numbers[numbers.length - 2] : 0,
      snatched: numbers.length >= 1 ? numbers[numbers.length - 1] : 0,
      uploadTime: age?.text ?? 'Unknown',
      timestamp: age?.timestamp ?? new Date(fetchedAt.getTime()),
      downloadLink: downloadHref ? this.absolute(downloadHref) : null,
      isFreeleech: /freeleech/i.test(rowText),
      url: `${this.baseUrl}/t/${id}`,
    };
  }

  private absolute(href: string): string {
    return /^https?:\/\//i.test(href) ? href : `${this.baseUrl}${href.startsWith('/') ? '' : '/'}${href}`;
  }
}
