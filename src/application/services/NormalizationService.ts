import { RejectedRecord } from '../../domain/entities/AnalysisJob.js';
import { RawRecord } from '../../domain/entities/RawRecord.js';
import { Transaction } from '../../domain/entities/Transaction.js';
import { UnparsableRecordError } from '../../domain/errors/AnalysisErrors.js';
import { ParsedAmount, parseAmount } from '../../domain/services/AmountParser.js';
import { DEFAULT_DATE_FORMATS, parseStatementDate } from '../../domain/services/DateParser.js';
import { MERCHANT_RULES, MerchantRule, normalizeMerchant } from '../../domain/services/MerchantNormalizer.js';
import { buildTransactionId } from '../../domain/services/TransactionHasher.js';
import { Logger, componentLogger } from '../../infrastructure/logging/Logger.js';

export interface NormalizationContext {
  statementId: string;
  accountId: string;
  /** Year given to dates printed without one, normally the upload's year. */
  referenceYear: number;
  defaultCurrency: string;
}

export interface NormalizationOutcome {
  transactions: Transaction[];
  rejected: RejectedRecord[];
}

export interface NormalizationSettings {
  dateFormats?: readonly string[];
  merchantRules?: readonly MerchantRule[];
}

const DEBIT_TYPES = /^(dr|debit|d|withdrawal|payment|purchase)$/i;
const CREDIT_TYPES = /^(cr|credit|c|deposit|refund)$/i;
const CURRENCY_CODE = /^[A-Z]{3}$/;

export class NormalizationService {
  private readonly dateFormats: readonly string[];
  private readonly merchantRules: readonly MerchantRule[];

  constructor(
    settings: NormalizationSettings = {},
    private readonly logger: Logger = componentLogger('NormalizationService'),
  ) {
    this.dateFormats = settings.dateFormats ?? DEFAULT_DATE_FORMATS;
    this.merchantRules = settings.merchantRules ?? MERCHANT_RULES;
  }

  /**
   * Converts raw rows into canonical transactions sorted by posted date, ties in document
   * order. A row that cannot be read is reported in `rejected` and never fails the batch.
   */
  normalize(records: readonly RawRecord[], context: NormalizationContext): NormalizationOutcome {
    const transactions: Transaction[] = [];
    const rejected: RejectedRecord[] = [];

    for (const record of records) {
      try {
        transactions.push(this.toTransaction(record, context));
      } catch (error) {
        if (!(error instanceof UnparsableRecordError)) {
          throw error;
        }
        rejected.push({ rowIndex: error.rowIndex, reason: error.reason });
      }
    }

    transactions.sort((a, b) => a.postedDate.localeCompare(b.postedDate) || a.rowIndex - b.rowIndex);

    if (rejected.length) {
      this.logger.warn(
        { statementId: context.statementId, rejected: rejected.length, firstRejected: rejected[0] },
        'records rejected during normalization',
      );
    }

    return { transactions, rejected };
  }

  private toTransaction(record: RawRecord, context: NormalizationContext): Transaction {
    const { fields, rowIndex } = record;

    if (!fields.date) {
      throw new UnparsableRecordError(rowIndex, 'missing date');
    }
    const postedDate = parseStatementDate(fields.date, {
      formats: this.dateFormats,
      referenceYear: context.referenceYear,
    });
    if (!postedDate) {
      throw new UnparsableRecordError(rowIndex, `unrecognised date "${fields.date}"`);
    }

    const parsed = this.resolveAmount(record);
    const explicitCurrency = fields.currency?.trim().toUpperCase();
    const currency =
      explicitCurrency && CURRENCY_CODE.test(explicitCurrency)
        ? explicitCurrency
        : (parsed.currency ?? context.defaultCurrency);

    const description = (fields.description ?? '').replace(/\s+/g, ' ').trim();

    return {
      id: buildTransactionId({
        statementId: context.statementId,
        rowIndex,
        postedDate,
        amount: parsed.minor,
        currency,
        description,
      }),
      statementId: context.statementId,
      accountId: context.accountId,
      postedDate,
      amount: parsed.minor,
      currency,
      merchant: normalizeMerchant(description, this.merchantRules),
      description,
      rowIndex,
      balance: this.resolveBalance(fields.balance),
      category: null,
      categoryConfidence: 0,
      categorySource: null,
      isAnomaly: null,
    };
  }

  // An unreadable balance only loses the balance, never the row.
  private resolveBalance(text: string | undefined): number | null {
    if (!text?.trim()) {
      return null;
    }
    return parseAmount(text)?.minor ?? null;
  }

  // Debit/credit columns decide the sign outright; a type column overrides a single amount column.
  private resolveAmount(record: RawRecord): ParsedAmount {
    const { fields, rowIndex } = record;
    const read = (text: string, column: string): ParsedAmount => {
      const parsed = parseAmount(text);
      if (!parsed) {
        throw new UnparsableRecordError(rowIndex, `unrecognised ${column} "${text}"`);
      }
      return parsed;
    };

    if (fields.debit || fields.credit) {
      const debit = fields.debit ? read(fields.debit, 'debit') : null;
      const credit = fields.credit ? read(fields.credit, 'credit') : null;
      const minor = Math.abs(credit?.minor ?? 0) - Math.abs(debit?.minor ?? 0);
      return { minor, currency: debit?.currency ?? credit?.currency };
    }

    if (!fields.amount) {
      throw new UnparsableRecordError(rowIndex, 'missing amount');
    }

    const parsed = read(fields.amount, 'amount');
    const type = fields.type?.trim() ?? '';
    if (DEBIT_TYPES.test(type)) {
      return { ...parsed, minor: -Math.abs(parsed.minor) };
    }
    if (CREDIT_TYPES.test(type)) {
      return { ...parsed, minor: Math.abs(parsed.minor) };
    }
    return parsed;
  }
}
