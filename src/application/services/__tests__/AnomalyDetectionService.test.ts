import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { makeTransaction } from '../../../__tests__/fixtures.js';
import { Transaction } from '../../../domain/entities/Transaction.js';
import { AnomalyDetectionService } from '../AnomalyDetectionService.js';

const service = new AnomalyDetectionService();

const series = (prefix: string, category: string, merchant: string, amounts: number[]): Transaction[] =>
  amounts.map((amount, index) => makeTransaction({ id: `${prefix}-${index}`, category, merchant, amount }));

describe('AnomalyDetectionService', () => {
  it('flags an amount far above the category history', () => {
    const history = series('h', 'Food & Dining', 'CAFE', Array.from({ length: 10 }, () => -1000));
    const batch = [
      makeTransaction({ id: 'small', category: 'Food & Dining', merchant: 'CAFE', amount: -900 }),
      makeTransaction({ id: 'huge', category: 'Food & Dining', merchant: 'CAFE', amount: -50000 }),
    ];

    assert.deepEqual(service.detect(batch, history), [
      { transactionId: 'huge', category: 'Food & Dining', reason: 'STATISTICAL_OUTLIER', amount: -50000, threshold: 1000 },
    ]);
    assert.deepEqual([...service.detectAnomalies(batch, history)], ['huge']);
  });

  it('never flags a category with fewer than three baseline transactions', () => {
    const history = series('h', 'Travel', 'OLD AIRLINE', [-1000, -1200]);
    const batch = [makeTransaction({ id: 'big', category: 'Travel', merchant: 'NEW AIRLINE', amount: -900000 })];

    assert.deepEqual(service.detect(batch, history), []);
  });

  it('flags only the first large payment to a merchant missing from the history', () => {
    const history = series('h', 'Travel', 'OLD AIRLINE', [-200000, -210000, -190000]);
    const batch = [
      makeTransaction({ id: 'first', category: 'Travel', merchant: 'NEW AIRLINE', amount: -150000 }),
      makeTransaction({ id: 'second', category: 'Travel', merchant: 'NEW AIRLINE', amount: -150000 }),
      makeTransaction({ id: 'known', category: 'Travel', merchant: 'OLD AIRLINE', amount: -150000 }),
      makeTransaction({ id: 'modest', category: 'Travel', merchant: 'BUS LINE', amount: -5000 }),
    ];

    assert.deepEqual(service.detect(batch, history), [
      { transactionId: 'first', category: 'Travel', reason: 'NEW_MERCHANT', amount: -150000, threshold: 100000 },
    ]);
  });

  it('uses the batch as its own baseline when the account has no history', () => {
    const batch = [
      ...series('b', 'Groceries', 'MARKET', Array.from({ length: 19 }, () => -1000)),
      makeTransaction({ id: 'spike', category: 'Groceries', merchant: 'MARKET', amount: -100000 }),
      makeTransaction({ id: 'first-time', category: 'Groceries', merchant: 'GOURMET HALL', amount: -60000 }),
    ];

    assert.deepEqual([...service.detectAnomalies(batch, [])], ['spike']);
  });

  it('marks every transaction with its anomaly flag', () => {
    const batch = [makeTransaction({ id: 'a' }), makeTransaction({ id: 'b' })];
    const marked = service.markAnomalies(batch, [
      { transactionId: 'b', category: 'Uncategorized', reason: 'STATISTICAL_OUTLIER', amount: -1, threshold: 0 },
    ]);

    assert.deepEqual(
      marked.map((txn) => [txn.id, txn.isAnomaly]),
      [
        ['a', false],
        ['b', true],
      ],
    );
    assert.equal(batch[0].isAnomaly, null);
  });
});
