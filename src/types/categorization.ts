import { UnsubscribeInfo } from './email';

// Taxonomy tags come from configuration, so the set is open-ended.
export type CategoryTag = string;

export type MatchRule =
  | { kind: 'keyword'; value: string }
  | { kind: 'domain'; value: string }
  | { kind: 'subject'; value: string };

export type Taxonomy = ReadonlyMap<CategoryTag, readonly MatchRule[]>;

export type NameMatchPolicy = 'substring' | 'word';

export interface ClassifierConfig {
  readonly taxonomy: Taxonomy;
  readonly scanName: string;
  readonly nameMatch: NameMatchPolicy;
}

export interface Classification {
  categories: ReadonlySet<CategoryTag>;
  isPersonalized: boolean;
  // Subject looks like sign-up or account mail
  potentialAccount?: boolean;
  unsubscribe?: UnsubscribeInfo;
}
