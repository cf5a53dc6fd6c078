import {
  CategoryTag,
  Classification,
  ClassifierConfig,
  MatchRule
} from '../types/categorization';
import { NormalizedMessage } from '../types/email';
import { extractUnsubscribe } from './unsubscribe-links';
import { moduleLogger } from '../utils/logger';

const logger = moduleLogger('EmailCategorization');

// Broadcast senders that merge the recipient's name into templates
export const AUTOMATED_SENDER_PATTERNS = [
  'noreply',
  'no-reply',
  'no_reply',
  'donotreply',
  'do-not-reply',
  'notifications',
  'notification',
  'mailer-daemon',
  'bounce'
];

export const ACCOUNT_SUBJECT_KEYWORDS = ['account', 'subscription', 'login', 'welcome'];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

interface MatchFields {
  domain: string;
  address: string;
  subject: string;
}

function ruleMatches(rule: MatchRule, fields: MatchFields): boolean {
  switch (rule.kind) {
    case 'keyword':
      return (
        fields.domain.includes(rule.value) ||
        fields.address.includes(rule.value) ||
        fields.subject.includes(rule.value)
      );
    case 'domain':
      return fields.domain === rule.value || fields.domain.endsWith(`.${rule.value}`);
    case 'subject':
      return fields.subject.includes(rule.value);
  }
}

export class EmailCategorizationService {
  private readonly config: ClassifierConfig;
  private readonly namePattern: RegExp | null;

  constructor(config: ClassifierConfig) {
    this.config = config;
    this.namePattern = this.buildNamePattern();
  }

  private buildNamePattern(): RegExp | null {
    const name = this.config.scanName.trim();
    if (!name) return null;

    const escaped = escapeRegExp(name);
    return this.config.nameMatch === 'word'
      ? new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, 'iu')
      : new RegExp(escaped, 'iu');
  }

  classify(message: NormalizedMessage): Classification {
    const classification: Classification = {
      categories: this.matchCategories(message),
      isPersonalized: this.isPersonalized(message),
      potentialAccount: this.isPotentialAccount(message),
      unsubscribe: extractUnsubscribe(message)
    };

    logger.debug({
      messageId: message.messageId,
      domain: message.senderDomain,
      categories: [...classification.categories],
      isPersonalized: classification.isPersonalized,
      potentialAccount: classification.potentialAccount,
      hasUnsubscribe: classification.unsubscribe !== undefined
    }, 'Message classified');

    return classification;
  }

  matchCategories(message: NormalizedMessage): Set<CategoryTag> {
    const fields: MatchFields = {
      domain: message.senderDomain.toLowerCase(),
      address: message.senderAddress.toLowerCase(),
      subject: message.subject.toLowerCase()
    };

    const categories = new Set<CategoryTag>();
    for (const [category, rules] of this.config.taxonomy) {
      if (rules.some(rule => ruleMatches(rule, fields))) {
        categories.add(category);
      }
    }
    return categories;
  }

  isPotentialAccount(message: NormalizedMessage): boolean {
    const subject = message.subject.toLowerCase();
    return ACCOUNT_SUBJECT_KEYWORDS.some(keyword => subject.includes(keyword));
  }

  isAutomatedSender(address: string): boolean {
    const lowered = address.toLowerCase();
    return AUTOMATED_SENDER_PATTERNS.some(pattern => lowered.includes(pattern));
  }

  isPersonalized(message: NormalizedMessage): boolean {
    if (!this.namePattern) return false;
    if (this.isAutomatedSender(message.senderAddress)) return false;

    return this.namePattern.test(message.subject) || this.namePattern.test(message.bodyText);
  }
}
