import { promises as fs } from 'node:fs';
import path from 'node:path';
import dayjs from 'dayjs';
import { Report } from '../types';

export const MAX_REPORT_ARTICLES = 10;

export function reportFileName(at: Date): string {
  return `property_analysis_${dayjs(at).format('YYYYMMDD_HHmmss')}.json`;
}

export function rawResponseFileName(at: Date): string {
  return `property_raw_${Math.floor(at.getTime() / 1000)}.txt`;
}

export async function writeJsonReport(
  outputDir: string,
  report: Report,
  at: Date,
): Promise<string> {
  const filePath = path.resolve(outputDir, reportFileName(at));
  const body: Report = {
    ...report,
    newsIntelligence: {
      totalArticles: report.newsIntelligence.totalArticles,
      articles: report.newsIntelligence.articles.slice(0, MAX_REPORT_ARTICLES),
    },
  };
  await fs.writeFile(filePath, JSON.stringify(body, null, 2), 'utf-8');
  return filePath;
}

export async function writeRawResponse(
  outputDir: string,
  rawText: string,
  at: Date,
): Promise<string> {
  const filePath = path.resolve(outputDir, rawResponseFileName(at));
  await fs.writeFile(filePath, rawText, 'utf-8');
  return filePath;
}
