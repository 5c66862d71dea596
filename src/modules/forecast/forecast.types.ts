import type { Weekday } from '../../utils/date.js';

export type TrackedCurrency = 'EUR' | 'USD' | 'JPY';

/** Amount per tracked currency. Units depend on the field (native or EUR-equivalent). */
export type CurrencyTriple = Record<TrackedCurrency, number>;

/** Currency code -> EUR per unit. Always holds EUR -> 1. */
export type RateTable = Readonly<Record<string, number>>;

export type Direction = 'credit' | 'debit';

export type Transaction = {
  date: string; // YYYY-MM-DD
  direction: Direction;
  amount: number; // original currency
  currency: string | null;
  category: string | null;
  amountEur?: number | null;
};

export type InvoiceStatus = 'Paid' | 'Open' | 'Overdue';

export type Invoice = {
  id?: string | null;
  status: InvoiceStatus;
  issueDate: string | null;
  dueDate: string | null;
  paymentDate: string | null;
  amount: number;
  currency: string | null;
};

export type ScheduledItem = {
  invoiceId: string | null;
  dueDate: string;
  expectedPaymentDate: string;
  amount: number;
  currency: string;
  amountEur: number;
};

export type WeeklyPattern = Partial<Record<Weekday, number>>;

export type ForecastScenario = 'base' | 'conservative' | 'optimistic';

export type ForecastParams = {
  startDate: string;
  maxForecastDate: string;
  dsoMean: number;
  dpoMean: number;
  avgDailyCredit: number;
  avgDailyDebit: number;
  weeklyCreditPattern: WeeklyPattern;
  weeklyDebitPattern: WeeklyPattern;
  inflationRate: number;
  volumeVolatilityCredit: number;
  volumeVolatilityDebit: number;
};

export type ForecastInputs = {
  transactions: readonly Transaction[];
  sales: readonly Invoice[];
  purchases: readonly Invoice[];
  rates: RateTable;
};

export type RiskLevel = 'Safe' | 'Warning' | 'Critical';

export type RiskTally = Record<RiskLevel, number>;

export type DailyForecastRecord = {
  date: string;
  weekday: Weekday;
  month: string;
  inflow: CurrencyTriple;
  outflow: CurrencyTriple;
  netFlow: CurrencyTriple;
  inflowEur: number;
  outflowEur: number;
  netFlowEur: number;
  cumulative: CurrencyTriple;
  cumulativeEur: number;
  cumulativeNetOfDebt: number;
  risk: RiskLevel;
};

export type WorstDay = {
  date: string;
  cumulativeEur: number;
  cumulativeNetOfDebt: number;
};

export type InitialPosition = {
  perCurrencyOriginal: CurrencyTriple;
  perCurrencyEUR: CurrencyTriple;
  totalEUR: number;
};

export type ReconciliationReport = {
  scheduledSplitRepairs: number;
  netFlowRepairs: number;
  finalBalanceRepaired: boolean;
};

export type ForecastRunResult = {
  records: DailyForecastRecord[];
  startDate: string;
  endDate: string;
  forecastDaysCount: number;
  initialPosition: InitialPosition;
  initialBalance: number;
  initialBalanceNet: number;
  finalBalance: number;
  finalBalanceNet: number;
  totalNetFlow: number;
  averageMonthlyRecurring: number;
  negativeDays: string[];
  riskZones: RiskTally;
  worstDay: WorstDay;
  scheduled: { receivables: ScheduledItem[]; payables: ScheduledItem[] };
  reconciliation: ReconciliationReport;
};
