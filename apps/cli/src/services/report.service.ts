import fs from 'fs';
import path from 'path';
import type { DownloadMethod, DownloadRecord } from '@subtitle-sync/shared-types';
import { logger } from '../utils/logger';

const RULE = '='.repeat(80);
const DASH_RULE = '-'.repeat(80);

export interface ReportOptions {
  method: DownloadMethod;
  generatedAt: Date;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

function renderRecord(record: DownloadRecord): string[] {
  const lines = ['', record.mediaTitle, `  Language: ${record.language.toUpperCase()}`];
  if (record.method === 'local') {
    lines.push(
      `  Rating: ${record.rating.toFixed(1)}/10`,
      `  Downloads: ${formatCount(record.downloadCount)}`,
      `  Release: ${record.releaseName}`,
      `  Uploader: ${record.uploader}`,
      `  File: ${path.basename(record.subtitleFile)}`
    );
  } else {
    lines.push('  Method: Plex subtitle agent');
  }
  lines.push(`  Timestamp: ${formatTimestamp(record.timestamp)}`);
  return lines;
}

export function renderReport(records: readonly DownloadRecord[], options: ReportOptions): string {
  if (records.length === 0) {
    return 'No subtitles were downloaded.';
  }

  const lines: string[] = [
    RULE,
    'SUBTITLE DOWNLOAD REPORT',
    RULE,
    `Total subtitles downloaded: ${records.length}`,
    `Download method: ${options.method}`,
    `Generated: ${formatTimestamp(options.generatedAt)}`,
    RULE,
  ];

  const sections: Array<[string, DownloadRecord[]]> = [
    ['MOVIES', records.filter((record) => record.mediaType === 'movie')],
    ['TV EPISODES', records.filter((record) => record.mediaType === 'episode')],
  ];
  for (const [label, group] of sections) {
    if (group.length === 0) continue;
    lines.push('', `${label} (${group.length} subtitles)`, DASH_RULE);
    for (const record of group) {
      lines.push(...renderRecord(record));
    }
  }

  lines.push('', RULE, 'SUMMARY STATISTICS', RULE);

  // Plex-agent records carry no rating or download figures
  const local = records.filter((record) => record.method === 'local');
  if (local.length > 0) {
    const averageRating = local.reduce((sum, record) => sum + record.rating, 0) / local.length;
    const totalDownloads = local.reduce((sum, record) => sum + record.downloadCount, 0);
    lines.push(
      `Average subtitle rating: ${averageRating.toFixed(1)}/10`,
      `Total community downloads: ${formatCount(totalDownloads)}`
    );
  }

  const languageCounts = new Map<string, number>();
  for (const record of records) {
    languageCounts.set(record.language, (languageCounts.get(record.language) ?? 0) + 1);
  }
  lines.push('', 'Language breakdown:');
  for (const [language, count] of [...languageCounts.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(`  ${language.toUpperCase()}: ${count}`);
  }
  lines.push(RULE);

  return lines.join('\n');
}

export async function saveReport(outputFile: string, report: string): Promise<void> {
  await fs.promises.writeFile(outputFile, `${report}\n`, 'utf-8');
  logger.info(`Report saved to: ${outputFile}`);
}
