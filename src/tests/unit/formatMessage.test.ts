import {
  escapeMarkdown,
  formatCycleSummary,
  formatListingMessage,
  formatLocalTime,
  formatStartMessage
} from '../../notify/formatMessage';
import { makeListing } from '../helpers/listings';

const AT = new Date('2026-01-10T10:05:00.000Z');

describe('formatMessage', () => {
  it('escapes legacy Markdown control characters', () => {
    expect(escapeMarkdown('a_b*c`d[e]')).toBe('a\\_b\\*c\\`d\\[e]');
  });

  it('formats a listing', () => {
    const listing = makeListing('x', {
      title: 'PS5_digital',
      price: '15 000 грн.',
      url: 'https://www.olx.ua/d/uk/obyavlenie/ps5-IDx.html'
    });

    expect(formatListingMessage(listing)).toBe(
      '📢 *PS5\\_digital*\n💰 15 000 грн.\n🔗 https://www.olx.ua/d/uk/obyavlenie/ps5-IDx.html'
    );
  });

  it('formats times in the configured zone', () => {
    expect(formatLocalTime(AT, 'UTC')).toBe('10.01.2026 10:05 UTC');
  });

  it('falls back to UTC for an unknown zone', () => {
    expect(formatLocalTime(AT, 'Mars/Olympus')).toBe('10.01.2026 10:05 UTC');
  });

  it('formats the start message', () => {
    expect(formatStartMessage(2, AT, 'UTC')).toBe(
      '🤖 OLX bot started. Monitoring 2 search page(s).\n🕐 10.01.2026 10:05 UTC'
    );
  });

  it('formats cycle summaries', () => {
    const base = { fetched: 5, matched: 3, fresh: 3, notified: 2, failed: 1, skipped: false, failedQueries: [], durationMs: 10 };

    expect(formatCycleSummary(base, AT, 'UTC')).toBe('⏱️ Check complete: 2 new ad(s), 1 failed.\n🕐 10.01.2026 10:05 UTC');
    expect(formatCycleSummary({ ...base, failed: 0 }, AT, 'UTC')).toBe('⏱️ Check complete: 2 new ad(s).\n🕐 10.01.2026 10:05 UTC');
    expect(formatCycleSummary({ ...base, skipped: true }, AT, 'UTC')).toBe(
      '⚠️ Check skipped: marketplace unreachable.\n🕐 10.01.2026 10:05 UTC'
    );
  });
});
