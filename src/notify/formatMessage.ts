import { DateTime } from 'luxon';
import { CycleResult, Listing } from '../types/listing';

/**
 * Escapes the characters Telegram's legacy Markdown treats as markup
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

export function formatListingMessage(listing: Listing): string {
  return `📢 *${escapeMarkdown(listing.title)}*\n💰 ${escapeMarkdown(listing.price)}\n🔗 ${escapeMarkdown(listing.url)}`;
}

export function formatLocalTime(date: Date, timezone: string): string {
  const local = DateTime.fromJSDate(date).setZone(timezone);
  return (local.isValid ? local : DateTime.fromJSDate(date).toUTC()).toFormat('dd.LL.yyyy HH:mm ZZZZ');
}

export function formatStartMessage(queryCount: number, startedAt: Date, timezone: string): string {
  return `🤖 OLX bot started. Monitoring ${queryCount} search page(s).\n🕐 ${formatLocalTime(startedAt, timezone)}`;
}

export function formatCycleSummary(result: CycleResult, finishedAt: Date, timezone: string): string {
  if (result.skipped) {
    return `⚠️ Check skipped: marketplace unreachable.\n🕐 ${formatLocalTime(finishedAt, timezone)}`;
  }
  const failed = result.failed > 0 ? `, ${result.failed} failed` : '';
  return `⏱️ Check complete: ${result.notified} new ad(s)${failed}.\n🕐 ${formatLocalTime(finishedAt, timezone)}`;
}
