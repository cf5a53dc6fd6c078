import { Classification } from '../types/categorization';
import { NormalizedMessage } from '../types/email';
import { DomainRecord, PersonalizedRecord } from '../types/reports';

/**
 * Folds classified messages into per-domain records and the list of
 * personalized messages. Single writer: callers feed it one message at a time.
 */
export class DomainAggregator {
  private readonly records = new Map<string, DomainRecord>();
  private readonly personalizedRecords: PersonalizedRecord[] = [];

  add(message: NormalizedMessage, classification: Classification): DomainRecord {
    let record = this.records.get(message.senderDomain);
    if (!record) {
      record = {
        domain: message.senderDomain,
        categories: new Set(),
        uniqueSenders: new Set(),
        totalEmails: 0,
        senderList: []
      };
      this.records.set(message.senderDomain, record);
    }

    for (const category of classification.categories) {
      record.categories.add(category);
    }

    if (!record.uniqueSenders.has(message.senderAddress)) {
      record.uniqueSenders.add(message.senderAddress);
      record.senderList.push(message.senderAddress);
    }

    record.totalEmails += 1;

    if (classification.unsubscribe) {
      record.unsubscribe = classification.unsubscribe;
      record.lastUpdated = message.arrivalDate;
    }

    if (classification.potentialAccount) {
      record.potentialAccount = true;
    }

    if (classification.isPersonalized) {
      this.personalizedRecords.push({
        senderName: message.senderName,
        senderAddress: message.senderAddress,
        rawHeaderBlock: message.rawHeaderBlock
      });
    }

    return record;
  }

  get(domain: string): DomainRecord | undefined {
    return this.records.get(domain);
  }

  domains(): DomainRecord[] {
    return [...this.records.values()];
  }

  /** Domains that sent at least one account-style message, alphabetically. */
  potentialAccounts(): string[] {
    return this.domains()
      .filter(record => record.potentialAccount)
      .map(record => record.domain)
      .sort();
  }

  personalized(): PersonalizedRecord[] {
    return [...this.personalizedRecords];
  }
}
