// ═══════════════════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Payin brackets, ordered. Upper bounds are inclusive.
 */
export enum PayinBracket {
  Below20 = 'Below20',
  From21To30 = 'From21To30',
  From31To50 = 'From31To50',
  Above50 = 'Above50',
}

/**
 * Line of business. `Unknown` is a valid outcome, not an error.
 */
export enum LOB {
  TW = 'TW',
  PvtCar = 'PvtCar',
  CV = 'CV',
  Bus = 'Bus',
  Taxi = 'Taxi',
  Misd = 'Misd',
  Unknown = 'Unknown',
}

/**
 * Result of classifying a payin value.
 */
export interface PayinClassification {
  value: number;
  bracket: PayinBracket;
}

// ═══════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A loosely-typed record as produced by an extractor.
 */
export type RawRecord = Record<string, unknown>;

/**
 * Canonical record. Frozen once normalized; `payinCategory` is always
 * `bracketFor(payinValue)`.
 */
export interface PolicyRecord {
  readonly segment: string;
  readonly policyType: string;
  readonly location: string;
  readonly payinRaw: string;
  readonly payinValue: number;
  readonly payinCategory: PayinBracket;
  readonly remarks: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// DECISION TABLE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Which insurers a rule applies to.
 */
export type InsurerScope =
  | { kind: 'all' }
  | { kind: 'list'; names: ReadonlySet<string> }
  | { kind: 'rest' };

/**
 * Payout formula applied to the payin value.
 */
export type Formula =
  | { kind: 'percentOf'; factor: number }
  | { kind: 'subtractFlat'; points: number }
  | { kind: 'identity' };

/**
 * A table entry as declared in configuration.
 */
export interface RuleSpec {
  lob: string;
  segment: string;
  insurers?: string | string[];  // Default: 'All Companies'
  formula: string;
  remarks?: string;              // Default: 'NIL'
}

/**
 * A parsed, read-only table entry.
 */
export interface RuleEntry {
  readonly index: number;
  readonly lob: LOB;
  readonly segmentPattern: string;
  readonly insurerScope: InsurerScope;
  readonly payoutFormula: Formula;
  readonly formulaText: string;
  readonly remarksCondition: string;
}

/**
 * Ordered rule table plus the exclusion index used by 'rest' scopes.
 * Keys of `exclusions` come from `groupKey(lob, segmentPattern)`.
 */
export interface DecisionTable {
  readonly rules: readonly RuleEntry[];
  readonly exclusions: ReadonlyMap<string, ReadonlySet<string>>;
}

/**
 * Which remarks-condition branch admitted a rule.
 */
export type ConditionKind = 'unconditional' | 'bracket' | 'informational';

/**
 * Outcome of looking a record up in the table.
 */
export interface MatchResult {
  rule?: RuleEntry;
  explanation: string;
  condition?: ConditionKind;
}

// ═══════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One assembled output row.
 */
export interface OutputRecord {
  segment: string;
  policyType: string;
  location: string;
  payin: string;
  payinRaw: string;
  payinValue: number;
  remarks: string;
  lob: LOB;
  payinCategory: PayinBracket;
  matchedSegment?: string;
  calculatedPayout: string;
  formulaUsed: string;
  ruleExplanation: string;
}

/**
 * Fault captured while assembling a single record.
 */
export interface RecordFault {
  index: number;
  message: string;
}

/**
 * Per-record result. A failed record still carries an output row with
 * error markers.
 */
export type RecordOutcome =
  | { ok: true; output: OutputRecord }
  | { ok: false; output: OutputRecord; fault: RecordFault };

/**
 * Derived batch metrics.
 */
export interface BatchSummary {
  totalRecords: number;
  avgPayin: number;
  uniqueSegments: number;
  formulaSummary: Record<string, number>;
  companyName: string;
}

/**
 * Result of assembling a batch.
 */
export interface BatchResult {
  outcomes: RecordOutcome[];
  records: OutputRecord[];
  summary: BatchSummary;
}

// ═══════════════════════════════════════════════════════════════════════════
// EXTRACTORS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A file handed to an extractor.
 */
export interface ExtractionInput {
  file: Uint8Array;
  filename: string;
  contentType: string;
}

/**
 * The result returned by an extractor. Items are unchecked; anything that
 * is not an object becomes an error row downstream.
 */
export interface ExtractorResult {
  records: unknown[];
  rawText?: string;
  cost?: number;
}

/**
 * Turns an uploaded file into loosely-typed records.
 */
export type Extractor = (input: ExtractionInput) => Promise<ExtractorResult>;

/**
 * Supported LLM providers.
 */
export enum LLMProviders {
  anthropic_claude_sonnet = 'anthropic_claude_sonnet',
  anthropic_claude_haiku = 'anthropic_claude_haiku',
  openai_gpt4o = 'openai_gpt4o',
  openai_gpt4o_mini = 'openai_gpt4o_mini',
}

/**
 * LLM provider specification.
 */
export interface ProviderSpec {
  model: string;
  maxTokens: number;
  costPerMillionInput: number;
  costPerMillionOutput: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════════════════

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Pipeline configuration.
 */
export interface PipelineConfig {
  companyName: string;
  input: ExtractionInput;
  extractor: Extractor;
  table?: DecisionTable;
  logLevel?: LogLevel;
  storeLogs?: boolean | string;  // true = "./payout-logs/run_<timestamp>_<id>/rawData.json"
  showProgress?: boolean;        // Default: true
}

/**
 * Pipeline result.
 */
export interface PipelineResult extends BatchResult {
  rawText?: string;
  parsedRecords: unknown[];
  extractionCost: number;
  logFolder?: string;
}
