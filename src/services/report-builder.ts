import { appendFile, mkdir, rename, writeFile } from 'fs/promises';
import path from 'path';
import {
  DOMAIN_ANALYSIS_COLUMNS,
  DomainRecord,
  PERSONALIZED_COLUMNS,
  PersonalizedRecord,
  ScanResult,
  SELECTION_COLUMNS
} from '../types/reports';
import { OutcomeSink, UnsubscribeOutcome } from '../types/unsubscribe';
import { PersistenceError } from '../types/errors';
import { toCsv } from '../utils/csv';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('ReportBuilder');

export const MIN_EMAILS_FOR_REPORT = 2;
export const LIST_SEPARATOR = '; ';

export const REPORT_FILES = {
  personalized: 'personalized_senders.csv',
  domainAnalysis: 'domain_analysis.csv',
  selection: 'unsubscribe_selection.csv'
} as const;

export interface ReportFiles {
  personalized: string;
  domainAnalysis: string;
  selection: string;
}

export type DomainAnalysisRow = Record<(typeof DOMAIN_ANALYSIS_COLUMNS)[number], string>;

export function reportableDomains(records: readonly DomainRecord[]): DomainRecord[] {
  return records
    .filter(record => record.totalEmails >= MIN_EMAILS_FOR_REPORT)
    .sort((a, b) => b.totalEmails - a.totalEmails || a.domain.localeCompare(b.domain));
}

export function toDomainAnalysisRow(record: DomainRecord): DomainAnalysisRow {
  return {
    'Domain': record.domain,
    'Categories': [...record.categories].sort().join(LIST_SEPARATOR),
    'Unique Senders': String(record.uniqueSenders.size),
    'Total Emails': String(record.totalEmails),
    'Sender List': record.senderList.join(LIST_SEPARATOR),
    'Unsubscribe URL': record.unsubscribe?.url ?? '',
    'Token': record.unsubscribe?.token ?? '',
    'Last Updated': record.lastUpdated?.toISOString() ?? ''
  };
}

export function buildDomainAnalysisRows(records: readonly DomainRecord[]): DomainAnalysisRow[] {
  return reportableDomains(records).map(toDomainAnalysisRow);
}

export function renderPersonalizedTable(records: readonly PersonalizedRecord[]): string {
  return toCsv(
    PERSONALIZED_COLUMNS,
    records.map(record => [record.senderName, record.senderAddress, record.rawHeaderBlock])
  );
}

export function renderDomainAnalysisTable(records: readonly DomainRecord[]): string {
  const rows = buildDomainAnalysisRows(records);
  return toCsv(
    DOMAIN_ANALYSIS_COLUMNS,
    rows.map(row => DOMAIN_ANALYSIS_COLUMNS.map(column => row[column]))
  );
}

/** Domain analysis plus the two columns the user edits before an unsubscribe run. */
export function renderSelectionTemplate(records: readonly DomainRecord[]): string {
  const rows = reportableDomains(records).map(record => {
    const row = toDomainAnalysisRow(record);
    return [
      ...DOMAIN_ANALYSIS_COLUMNS.map(column => row[column]),
      'no',
      record.unsubscribe ? 'yes' : 'no'
    ];
  });
  return toCsv(SELECTION_COLUMNS, rows);
}

export function formatOutcomeLine(outcome: UnsubscribeOutcome): string {
  const detail = outcome.detail.replace(/\s*[\r\n]+\s*/g, ' ');
  return [outcome.attemptedAt.toISOString(), outcome.domain, outcome.token, outcome.result, detail].join(' | ');
}

/** Writes through a temporary sibling and renames it, so a failed write never truncates the old file. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    throw new PersistenceError(`cannot write ${filePath}`, error instanceof Error ? error.message : error);
  }
}

export async function writeReports(outputDir: string, result: ScanResult): Promise<ReportFiles> {
  const files: ReportFiles = {
    personalized: path.join(outputDir, REPORT_FILES.personalized),
    domainAnalysis: path.join(outputDir, REPORT_FILES.domainAnalysis),
    selection: path.join(outputDir, REPORT_FILES.selection)
  };

  await writeFileAtomic(files.personalized, renderPersonalizedTable(result.personalized));
  await writeFileAtomic(files.domainAnalysis, renderDomainAnalysisTable(result.domains));
  await writeFileAtomic(files.selection, renderSelectionTemplate(result.domains));

  logger.info({
    outputDir,
    personalized: result.personalized.length,
    domains: reportableDomains(result.domains).length
  }, 'Reports written');

  return files;
}

export class FileOutcomeSink implements OutcomeSink {
  constructor(private readonly filePath: string) {}

  async append(outcome: UnsubscribeOutcome): Promise<void> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, formatOutcomeLine(outcome) + '\n', 'utf-8');
    } catch (error) {
      throw new PersistenceError(`cannot append to ${this.filePath}`, error instanceof Error ? error.message : error);
    }
  }
}
