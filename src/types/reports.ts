import { CategoryTag } from './categorization';
import { DecodeErrorEntry, UnsubscribeInfo } from './email';

export interface DomainRecord {
  domain: string;
  categories: Set<CategoryTag>;
  uniqueSenders: Set<string>;
  totalEmails: number;
  senderList: string[];
  unsubscribe?: UnsubscribeInfo;
  lastUpdated?: Date;
  potentialAccount?: boolean;
}

export interface PersonalizedRecord {
  senderName: string;
  senderAddress: string;
  rawHeaderBlock: string;
}

export interface ScanResult {
  startedAt: Date;
  completedAt: Date;
  candidates: number;
  processed: number;
  skipped: number;
  duplicates: number;
  decodeErrors: DecodeErrorEntry[];
  processedIds: string[];
  domains: DomainRecord[];
  personalized: PersonalizedRecord[];
  potentialAccounts: string[];
}

export const PERSONALIZED_COLUMNS = ['Sender Name', 'Email Address', 'Full Header'] as const;

export const DOMAIN_ANALYSIS_COLUMNS = [
  'Domain',
  'Categories',
  'Unique Senders',
  'Total Emails',
  'Sender List',
  'Unsubscribe URL',
  'Token',
  'Last Updated'
] as const;

export const SELECTION_COLUMNS = [...DOMAIN_ANALYSIS_COLUMNS, 'Delete', 'List-Unsubscribe'] as const;
