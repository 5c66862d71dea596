import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import { toDateOnly } from '../../utils/date.js';
import type { Invoice, Transaction } from '../forecast/forecast.types.js';
import type { HistorySet } from './statistics.service.js';

export const BANK_TRANSACTIONS_FILE = 'bank_transactions.csv';
export const SALES_INVOICES_FILE = 'sales_invoices.csv';
export const PURCHASE_INVOICES_FILE = 'purchase_invoices.csv';

const RowsSchema = z.array(z.record(z.string(), z.string()));

const blankToNull = (v: string | undefined) => {
  const s = (v ?? '').trim();
  return s ? s : null;
};

const requiredDay = z.string().transform((value, ctx) => {
  const day = toDateOnly(value);
  if (!day) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date "${value}"` });
    return z.NEVER;
  }
  return day;
});

const optionalDay = z
  .string()
  .optional()
  .transform((value) => toDateOnly(blankToNull(value)));

const amount = z
  .string()
  .trim()
  .min(1, 'amount is required')
  .transform(Number)
  .pipe(z.number().finite());

const optionalAmount = z
  .string()
  .optional()
  .transform((value) => {
    const s = blankToNull(value);
    return s === null ? null : Number(s);
  })
  .pipe(z.number().finite().nullable());

const BankRowSchema = z.object({
  date: requiredDay,
  type: z
    .string()
    .trim()
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(['credit', 'debit'])),
  amount,
  currency: z.string().optional().transform(blankToNull),
  category: z.string().optional().transform(blankToNull),
  amount_eur: optionalAmount,
});

const InvoiceRowSchema = z.object({
  invoice_id: z.string().optional().transform(blankToNull),
  issue_date: optionalDay,
  due_date: optionalDay,
  payment_date: optionalDay,
  amount,
  currency: z.string().optional().transform(blankToNull),
  status: z.string().trim().pipe(z.enum(['Paid', 'Open', 'Overdue'])),
});

function loadError(message: string, statusCode: number): Error {
  return Object.assign(new Error(message), { statusCode });
}

async function readRows(dir: string, file: string): Promise<Record<string, string>[]> {
  const filePath = path.join(dir, file);
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') throw loadError(`data file not found: ${filePath}`, 404);
    throw err;
  }
  return parseRows(raw);
}

function parseRows(raw: string): Record<string, string>[] {
  const parsed: unknown = parseCsv(raw, { columns: true, skip_empty_lines: true, trim: true, bom: true });
  return RowsSchema.parse(parsed);
}

function validateRows<Out>(
  file: string,
  rows: readonly Record<string, string>[],
  schema: z.ZodType<Out, z.ZodTypeDef, unknown>
): Out[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue?.path.join('.') ?? '';
      // Row numbers count the header as line 1.
      throw loadError(`${file} row ${index + 2}: ${field ? `${field}: ` : ''}${issue?.message ?? 'invalid row'}`, 422);
    }
    return result.data;
  });
}

/** Parses bank transaction CSV text (date, type, amount, currency, category, optional amount_eur). */
export function parseBankTransactions(raw: string, file = BANK_TRANSACTIONS_FILE): Transaction[] {
  return toTransactions(file, parseRows(raw));
}

/** Parses invoice CSV text (invoice_id, issue_date, due_date, payment_date, amount, currency, status). */
export function parseInvoices(raw: string, file: string): Invoice[] {
  return toInvoices(file, parseRows(raw));
}

function toTransactions(file: string, rows: readonly Record<string, string>[]): Transaction[] {
  return validateRows(file, rows, BankRowSchema).map((row) => ({
    date: row.date,
    direction: row.type,
    amount: row.amount,
    currency: row.currency,
    category: row.category,
    amountEur: row.amount_eur,
  }));
}

function toInvoices(file: string, rows: readonly Record<string, string>[]): Invoice[] {
  return validateRows(file, rows, InvoiceRowSchema).map((row) => ({
    id: row.invoice_id,
    status: row.status,
    issueDate: row.issue_date,
    dueDate: row.due_date,
    paymentDate: row.payment_date,
    amount: row.amount,
    currency: row.currency,
  }));
}

/** Loads the three history files from a directory. */
export async function loadHistory(dir: string): Promise<HistorySet> {
  const [bank, sales, purchases] = await Promise.all([
    readRows(dir, BANK_TRANSACTIONS_FILE),
    readRows(dir, SALES_INVOICES_FILE),
    readRows(dir, PURCHASE_INVOICES_FILE),
  ]);
  return {
    transactions: toTransactions(BANK_TRANSACTIONS_FILE, bank),
    sales: toInvoices(SALES_INVOICES_FILE, sales),
    purchases: toInvoices(PURCHASE_INVOICES_FILE, purchases),
  };
}
