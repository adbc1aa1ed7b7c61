import { LLMProviders, LOB, PayinBracket, type ProviderSpec } from '../types.js';

// LLM Provider configuration
export const PROVIDER_SPECS: Record<LLMProviders, ProviderSpec> = {
  [LLMProviders.anthropic_claude_sonnet]: { model: 'claude-sonnet-4-5-20250929', maxTokens: 4000, costPerMillionInput: 3.00, costPerMillionOutput: 15.00 },
  [LLMProviders.anthropic_claude_haiku]: { model: 'claude-haiku-4-5-20251001', maxTokens: 4000, costPerMillionInput: 1.00, costPerMillionOutput: 5.00 },
  [LLMProviders.openai_gpt4o]: { model: 'gpt-4o', maxTokens: 4000, costPerMillionInput: 2.50, costPerMillionOutput: 10.00 },
  [LLMProviders.openai_gpt4o_mini]: { model: 'gpt-4o-mini', maxTokens: 4000, costPerMillionInput: 0.15, costPerMillionOutput: 0.60 },
};

export const TOKENS_PER_MILLION = 1_000_000;

// Extractor constants
export const DEFAULT_ENDPOINT_TIMEOUT_MS = 30000;

// Payin constants
export const BRACKET_UPPER_BOUNDS: readonly [PayinBracket, number][] = [
  [PayinBracket.Below20, 20],
  [PayinBracket.From21To30, 30],
  [PayinBracket.From31To50, 50],
];

export const BRACKET_LABELS: Record<PayinBracket, string> = {
  [PayinBracket.Below20]: 'Payin Below 20%',
  [PayinBracket.From21To30]: 'Payin 21% to 30%',
  [PayinBracket.From31To50]: 'Payin 31% to 50%',
  [PayinBracket.Above50]: 'Payin Above 50%',
};

// LOB constants
export const LOB_CODES: Record<LOB, string> = {
  [LOB.TW]: 'TW',
  [LOB.PvtCar]: 'PVT CAR',
  [LOB.CV]: 'CV',
  [LOB.Bus]: 'BUS',
  [LOB.Taxi]: 'TAXI',
  [LOB.Misd]: 'MISD',
  [LOB.Unknown]: 'UNKNOWN',
};

// Order is precedence: first set with a hit wins
export const LOB_KEYWORDS: readonly [LOB, readonly string[]][] = [
  [LOB.TW, ['TW', '2W', 'MC', 'SC', '1+5', 'TWO WHEELER']],
  [LOB.PvtCar, ['PVT CAR', 'PRIVATE CAR', 'CAR', 'PCI']],
  [LOB.CV, ['CV', 'COMMERCIAL', 'LCV', 'GVW', 'TN', 'UPTO', 'PCV', 'GCV']],
  [LOB.Bus, ['BUS']],
  [LOB.Taxi, ['TAXI']],
  [LOB.Misd, ['MISD', 'TRACTOR', 'MISC', 'AMBULANCE']],
];

// Words that contain a keyword of an earlier set but belong to a later one
export const LOB_KEYWORD_MASKS: ReadonlyMap<string, readonly string[]> = new Map([
  ['SC', ['SCHOOL', 'MISC']],
]);

// Make/tonnage hints that only ever show up in remarks
export const CV_REMARK_KEYWORDS: readonly string[] = ['TATA', 'MARUTI', 'GVW', 'TN'];

// Segment constants
export const CV_UPTO_KEYWORDS: readonly string[] = ['UPTO 2.5', '2.5 TN', '2.5 GVW'];
export const COMP_KEYWORDS: readonly string[] = ['COMP', 'COMPREHENSIVE', 'PACKAGE', '1ST PARTY', '1+1'];
export const TW_SAOD_KEYWORDS: readonly string[] = ['SAOD', ...COMP_KEYWORDS];
export const TW_NEW_KEYWORDS: readonly string[] = ['1+5', 'NEW', 'FRESH'];

// Scope constants
export const ALL_COMPANIES = 'All Companies';
export const REST_OF_COMPANIES = 'Rest of Companies';
export const COMPANY_STOP_WORDS: ReadonlySet<string> = new Set([
  'GENERAL', 'INSURANCE', 'CO', 'COMPANY', 'LTD', 'LIMITED',
]);

// Output constants
export const NO_RULE_FORMULA = 'No matching rule found';
export const ERROR_FORMULA = 'Error in calculation';
export const ERROR_PAYOUT = 'Error';
export const DEFAULT_POLICY_TYPE = 'Comp';
export const DEFAULT_LOCATION = 'N/A';
export const REMARKS_SEPARATOR = '; ';
export const NIL_CONDITION = 'NIL';

// Run log constants
export const DEFAULT_LOG_ROOT = './payout-logs';
