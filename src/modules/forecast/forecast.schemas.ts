import { z } from 'zod';
import { toDateOnly } from '../../utils/date.js';

const finite = z.number().finite();

/** Accepts any parseable date and normalizes it to YYYY-MM-DD. */
export const DaySchema = z.string().transform((value, ctx) => {
  const day = toDateOnly(value);
  if (!day) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a valid date (YYYY-MM-DD)' });
    return z.NEVER;
  }
  return day;
});

const WeeklyPatternSchema = z
  .object({
    Monday: finite,
    Tuesday: finite,
    Wednesday: finite,
    Thursday: finite,
    Friday: finite,
    Saturday: finite,
    Sunday: finite,
  })
  .partial()
  .strict();

export const ForecastParamsSchema = z.object({
  startDate: DaySchema,
  maxForecastDate: DaySchema,
  dsoMean: finite.default(0),
  dpoMean: finite.default(0),
  avgDailyCredit: finite.default(0),
  avgDailyDebit: finite.default(0),
  weeklyCreditPattern: WeeklyPatternSchema.default({}),
  weeklyDebitPattern: WeeklyPatternSchema.default({}),
  inflationRate: finite.default(0),
  volumeVolatilityCredit: finite.nonnegative().default(0),
  volumeVolatilityDebit: finite.nonnegative().default(0),
});

export type ForecastParamsInput = z.input<typeof ForecastParamsSchema>;

const CurrencyTripleSchema = z.object({ EUR: finite, USD: finite, JPY: finite });

export const ForecastPolicyOverridesSchema = z
  .object({
    debtPrincipal: finite.nonnegative(),
    debtAnnualInterestRate: finite.nonnegative(),
    debtMonthlyInterest: finite.nonnegative(),
    maxForecastDate: DaySchema,
    maxHorizonDays: z.number().int().nonnegative(),
    criticalThreshold: finite,
    seedOffset: z.number().int(),
    tolerance: finite.positive(),
    defaultCurrencyShares: CurrencyTripleSchema,
    fallbackRates: z.record(z.string(), finite.positive()),
    recurringCategories: z.array(z.string()),
    loanInterestCategory: z.string(),
  })
  .partial()
  .strict();

export type ForecastPolicyOverrides = z.infer<typeof ForecastPolicyOverridesSchema>;

export const TransactionSchema = z.object({
  date: DaySchema,
  direction: z.enum(['credit', 'debit']),
  amount: finite,
  currency: z.string().nullable().default(null),
  category: z.string().nullable().default(null),
  amountEur: finite.nullable().optional(),
});

const OptionalDaySchema = z
  .string()
  .nullable()
  .optional()
  .transform((value) => toDateOnly(value));

export const InvoiceSchema = z.object({
  id: z.string().nullable().optional(),
  status: z.enum(['Paid', 'Open', 'Overdue']),
  issueDate: OptionalDaySchema,
  dueDate: OptionalDaySchema,
  paymentDate: OptionalDaySchema,
  amount: finite,
  currency: z.string().nullable().default(null),
});

export const ScenarioSchema = z.enum(['base', 'conservative', 'optimistic']);

export const ForecastRunBodySchema = z.object({
  transactions: z.array(TransactionSchema).default([]),
  sales: z.array(InvoiceSchema).default([]),
  purchases: z.array(InvoiceSchema).default([]),
  params: ForecastParamsSchema,
  rates: z.record(z.string(), z.number()).optional(),
  scenario: ScenarioSchema.default('base'),
  policy: ForecastPolicyOverridesSchema.optional(),
});

export type ForecastRunBody = z.infer<typeof ForecastRunBodySchema>;

export const ForecastQuerySchema = z.object({
  startDate: DaySchema,
  maxForecastDate: DaySchema.optional(),
  scenario: ScenarioSchema.default('base'),
});

/** First issue as "path: message", for 400 responses. */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid input';
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
