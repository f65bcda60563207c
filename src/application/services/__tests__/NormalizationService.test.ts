import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { RawFields, RawRecord } from '../../../domain/entities/RawRecord.js';
import { NormalizationService } from '../NormalizationService.js';

const context = { statementId: 'stmt-1', accountId: 'acct-1', referenceYear: 2024, defaultCurrency: 'USD' };
const service = new NormalizationService();

const rows = (...fields: RawFields[]): RawRecord[] =>
  fields.map((entry, rowIndex) => ({ rowIndex, fields: entry, cells: [] }));

describe('NormalizationService', () => {
  it('keeps good rows when one date is unreadable and sorts by posted date', () => {
    const outcome = service.normalize(
      rows(
        { date: '2024-01-05', description: 'SQ *BLUE BOTTLE COFFEE #12', amount: '-4.50' },
        { date: 'not a date', description: 'GROCERY', amount: '-20.00' },
        { date: '2024-01-03', description: 'PAYROLL ACME', amount: '2,500.00' },
      ),
      context,
    );

    assert.deepEqual(
      outcome.transactions.map((txn) => [txn.rowIndex, txn.postedDate, txn.amount, txn.currency, txn.merchant]),
      [
        [2, '2024-01-03', 250000, 'USD', 'PAYROLL ACME'],
        [0, '2024-01-05', -450, 'USD', 'BLUE BOTTLE COFFEE'],
      ],
    );
    assert.deepEqual(outcome.rejected, [{ rowIndex: 1, reason: 'unrecognised date "not a date"' }]);
  });

  it('leaves category and anomaly fields unset', () => {
    const [txn] = service.normalize(rows({ date: '2024-01-05', description: 'BOOKS', amount: '-9.99' }), context).transactions;

    assert.equal(txn.category, null);
    assert.equal(txn.categoryConfidence, 0);
    assert.equal(txn.categorySource, null);
    assert.equal(txn.isAnomaly, null);
    assert.equal(txn.statementId, 'stmt-1');
    assert.equal(txn.accountId, 'acct-1');
  });

  it('signs debit and credit columns', () => {
    const { transactions } = service.normalize(
      rows(
        { date: '03/01/2024', description: 'RENT', debit: '800.00', balance: '1200.00' },
        { date: '03/02/2024', description: 'SALARY', credit: '2500.00', balance: '3700.00' },
      ),
      context,
    );

    assert.deepEqual(
      transactions.map((txn) => [txn.postedDate, txn.amount, txn.balance]),
      [
        ['2024-03-01', -80000, 120000],
        ['2024-03-02', 250000, 370000],
      ],
    );
  });

  it('lets a type column override the amount sign and reads an explicit currency', () => {
    const { transactions } = service.normalize(
      rows(
        { date: '2024-04-01', description: 'CARD FEE', amount: '15.00', type: 'DR', currency: 'eur' },
        { date: '2024-04-02', description: 'REFUND', amount: '(12.00)', type: 'CR', currency: 'eur' },
      ),
      context,
    );

    assert.deepEqual(
      transactions.map((txn) => [txn.amount, txn.currency]),
      [
        [-1500, 'EUR'],
        [1200, 'EUR'],
      ],
    );
  });

  it('gives yearless dates the reference year', () => {
    const { transactions } = service.normalize(rows({ date: '02/14', description: 'FLOWERS', amount: '-30.00' }), {
      ...context,
      referenceYear: 2023,
    });

    assert.equal(transactions[0].postedDate, '2023-02-14');
  });

  it('rejects rows with a missing or unreadable amount', () => {
    const outcome = service.normalize(
      rows({ date: '2024-01-02', description: 'NO AMOUNT' }, { date: '2024-01-02', description: 'BAD AMOUNT', amount: 'abc' }),
      context,
    );

    assert.equal(outcome.transactions.length, 0);
    assert.deepEqual(outcome.rejected, [
      { rowIndex: 0, reason: 'missing amount' },
      { rowIndex: 1, reason: 'unrecognised amount "abc"' },
    ]);
  });

  it('keeps document order for same-day rows and gives identical rows distinct ids', () => {
    const { transactions } = service.normalize(
      rows(
        { date: '2024-01-02', description: 'COFFEE', amount: '-3.00' },
        { date: '2024-01-02', description: 'COFFEE', amount: '-3.00' },
      ),
      context,
    );

    assert.deepEqual(
      transactions.map((txn) => txn.rowIndex),
      [0, 1],
    );
    assert.notEqual(transactions[0].id, transactions[1].id);

    const again = service.normalize(rows({ date: '2024-01-02', description: 'COFFEE', amount: '-3.00' }), context);
    assert.equal(again.transactions[0].id, transactions[0].id);
  });
});
