// Plan kinds as they appear in datasets and on bills
export type ContractType = 'mtm' | 'term' | 'prepaid';

export type PlanLabel = 'MTM' | 'TERM' | 'PREPAID';

export interface CallRecord {
  readonly source: string;
  readonly destination: string;
  readonly time: Date;
  readonly durationSeconds: number;
}

export interface BillSummary {
  month: number;
  year: number;
  type: PlanLabel | null;
  fixed: number;
  free_mins: number;
  billed_mins: number;
  min_rate: number;
  total: number;
}

export interface RateSchedule {
  monthToMonth: {
    monthlyFee: number;
    perMinute: number;
  };
  term: {
    monthlyFee: number;
    perMinute: number;
    includedMinutes: number;
    deposit: number;
  };
  prepaid: {
    perMinute: number;
    topUpThreshold: number;
    topUpAmount: number;
  };
}

// Partial overrides accepted by loadRateSchedule
export type RateOverrides = {
  [K in keyof RateSchedule]?: Partial<RateSchedule[K]>;
};

export type ContractSpec =
  | { type: 'mtm'; start: string }
  | { type: 'term'; start: string; end: string }
  | { type: 'prepaid'; start: string; balance: number };

export interface LineSpec {
  number: string;
  contract: ContractSpec;
  cancelled_on?: string;
}

export interface CallSpec {
  source: string;
  destination: string;
  time: string;
  duration_seconds: number;
}

export interface UsageDataset {
  lines: LineSpec[];
  calls: CallSpec[];
}

// Engine output
export interface LineResult {
  number: string;
  contract_type: ContractType;
  bills: BillSummary[];
  cancelled_on?: string;
  amount_due_on_cancel?: number;
  // Fixed-term lines only
  deposit_released?: boolean;
  // Prepaid lines only
  top_ups_charged?: number;
}

export interface EngineResult {
  first_month: { month: number; year: number };
  last_month: { month: number; year: number };
  lines: LineResult[];
  calls_billed: number;
  calls_skipped: number;
}

export interface LineStatement {
  number: string;
  contract_type: ContractType;
  months_billed: number;
  total_billed: number;
  total_minutes: number;
  billed_minutes: number;
  free_minutes: number;
  amount_due_on_cancel?: number;
}

export interface BillingStatement {
  total_lines: number;
  cancelled_lines: number;
  grand_total: number;
  lines: LineStatement[];
  summary: string;
  warnings: string[];
  generated_at: string;
}

// Error handling types
export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ProcessingResult {
  success: boolean;
  statement?: BillingStatement;
  errors?: ValidationError[];
  warnings?: string[];
}
