import type { MediaItem } from '@subtitle-sync/shared-types';

function pad2(value: number | undefined): string {
  return String(value ?? 0).padStart(2, '0');
}

export function displayTitle(item: MediaItem): string {
  if (item.type === 'episode') {
    const show = item.showTitle || 'Unknown show';
    return `${show} - S${pad2(item.seasonNumber)}E${pad2(item.episodeNumber)} - ${item.title}`;
  }
  return item.title;
}

/**
 * Requested languages the item has no subtitle stream for, in requested order.
 */
export function missingLanguages(item: MediaItem, requested: readonly string[]): string[] {
  const existing = new Set(item.subtitleLanguages);
  const missing: string[] = [];
  for (const language of requested) {
    if (!existing.has(language) && !missing.includes(language)) {
      missing.push(language);
    }
  }
  return missing;
}

export function needsSubtitles(item: MediaItem, requested: readonly string[]): boolean {
  return missingLanguages(item, requested).length > 0;
}
