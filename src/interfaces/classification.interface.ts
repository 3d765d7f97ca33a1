/**
 * Closed set of issue types. The lexicon registry must declare each one
 * except UNCLASSIFIED.
 */
export enum IssueType {
  FIBER_CUT = 'fiber_cut',
  INTERNET_DOWN = 'internet_down',
  SLOW_INTERNET = 'slow_internet',
  WIFI_ISSUE = 'wifi_issue',
  POWER_ISSUE = 'power_issue',
  TV_ISSUE = 'tv_issue',
  BILLING_ISSUE = 'billing_issue',
  UNCLASSIFIED = 'unclassified',
}

export enum MatchTier {
  AREA = 'area',
  TYPE = 'type',
  DOMAIN = 'domain',
  WORD = 'word',
}

export interface KeywordMatch {
  tier: MatchTier;
  term: string;
  score: number;
}

export interface TechnicalParameters {
  speedMbps?: number;
  durationMinutes?: number;
  deviceCount?: number;
  errorCodes: string[];
}

export interface ClassificationResult {
  issueType: IssueType;
  subIssue?: string;
  confidence: number;
  score: number;
  matches: KeywordMatch[];
  parameters: TechnicalParameters;
  /** True when prior customer turns were needed to reach the result */
  usedHistory: boolean;
}
