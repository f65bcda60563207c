import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { makeTransaction } from '../../../../__tests__/fixtures.js';
import { AnalysisJob } from '../../../../domain/entities/AnalysisJob.js';
import { AnalysisResult, StatementSummary } from '../../../../domain/entities/AnalysisResult.js';
import { InvalidStageTransitionError, JobNotFoundError } from '../../../../domain/errors/AnalysisErrors.js';
import { InMemoryObjectStorage } from '../InMemoryObjectStorage.js';
import { InMemoryStorageAdapter } from '../InMemoryStorageAdapter.js';

const job = (id: string, createdAt: string): AnalysisJob => ({
  id,
  statementId: `stmt-${id}`,
  accountId: 'acct-1',
  declaredFormat: 'csv',
  stage: 'Created',
  errorDetail: null,
  history: [{ stage: 'Created', enteredAt: createdAt }],
  createdAt,
  updatedAt: createdAt,
});

const summary = (currency: string): StatementSummary => ({
  currency,
  periodStart: null,
  periodEnd: null,
  transactionCount: 0,
  totalIncome: 0,
  totalExpenses: 0,
  netCashflow: 0,
  openingBalance: null,
  closingBalance: null,
  savingsRate: 0,
  expenseRatio: 0,
  categories: [],
  topCategories: [],
  monthly: [],
  trends: [],
});

const result = (jobId: string, accountId: string, createdAt: string, currency = 'USD'): AnalysisResult => ({
  jobId,
  statementId: `stmt-${jobId}`,
  accountId,
  transactions: [makeTransaction({ id: `${jobId}-txn`, accountId })],
  summary: summary(currency),
  anomalies: [],
  anomalyFindings: [],
  unparsableRecords: 0,
  processingTimeMs: 0,
  createdAt,
});

describe('InMemoryStorageAdapter', () => {
  it('hands out copies of stored jobs', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.saveJob(job('a', '2024-01-01T00:00:00.000Z'));

    const loaded = await storage.loadJob('a');
    assert.ok(loaded);
    loaded.stage = 'Completed';

    assert.equal((await storage.loadJob('a'))?.stage, 'Created');
  });

  it('lists jobs oldest first', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.saveJob(job('late', '2024-01-02T00:00:00.000Z'));
    await storage.saveJob(job('early', '2024-01-01T00:00:00.000Z'));

    assert.deepEqual(
      (await storage.listJobs()).map((entry) => entry.id),
      ['early', 'late'],
    );
  });

  it('applies legal stage transitions and records them', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.saveJob(job('a', '2024-01-01T00:00:00.000Z'));

    const updated = await storage.updateJobStage('a', 'Extracting', '2024-01-01T00:00:05.000Z');

    assert.equal(updated.stage, 'Extracting');
    assert.equal(updated.updatedAt, '2024-01-01T00:00:05.000Z');
    assert.deepEqual(
      updated.history.map((entry) => entry.stage),
      ['Created', 'Extracting'],
    );
  });

  it('rejects illegal transitions and unknown jobs', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.saveJob(job('a', '2024-01-01T00:00:00.000Z'));

    await assert.rejects(storage.updateJobStage('a', 'Completed', '2024-01-01T00:00:05.000Z'), InvalidStageTransitionError);
    await assert.rejects(storage.updateJobStage('zzz', 'Extracting', '2024-01-01T00:00:05.000Z'), JobNotFoundError);
    assert.equal((await storage.loadJob('a'))?.stage, 'Created');
  });

  it('stores a result once per job', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.saveResult(result('a', 'acct-1', '2024-01-01T00:00:00.000Z'));

    await assert.rejects(storage.saveResult(result('a', 'acct-1', '2024-01-01T00:00:00.000Z')), /already exists/);
  });

  it('builds account history and the latest summary from completed jobs', async () => {
    const storage = new InMemoryStorageAdapter();
    const complete = async (id: string, accountId: string, createdAt: string, currency: string): Promise<void> => {
      await storage.saveJob({ ...job(id, createdAt), accountId, stage: 'Aggregating' });
      await storage.completeJob(result(id, accountId, createdAt, currency), createdAt, null);
    };
    await complete('b', 'acct-1', '2024-02-01T00:00:00.000Z', 'EUR');
    await complete('a', 'acct-1', '2024-01-01T00:00:00.000Z', 'USD');
    await complete('c', 'acct-2', '2024-03-01T00:00:00.000Z', 'GBP');

    assert.deepEqual(
      (await storage.loadAccountHistory('acct-1')).map((txn) => txn.id),
      ['a-txn', 'b-txn'],
    );
    assert.equal((await storage.loadLatestSummary('acct-1'))?.currency, 'EUR');
    assert.equal(await storage.loadLatestSummary('acct-9'), null);
  });

  it('completes a job and stores its result in one step', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.saveJob({ ...job('a', '2024-01-01T00:00:00.000Z'), stage: 'Aggregating' });

    const completed = await storage.completeJob(
      result('a', 'acct-1', '2024-01-01T00:00:09.000Z'),
      '2024-01-01T00:00:09.000Z',
      null,
    );

    assert.equal(completed.stage, 'Completed');
    assert.equal((await storage.loadJob('a'))?.stage, 'Completed');
    assert.equal((await storage.loadResult('a'))?.jobId, 'a');
  });

  it('stores nothing when the job has already failed', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.saveJob({ ...job('a', '2024-01-01T00:00:00.000Z'), stage: 'Failed' });

    await assert.rejects(
      storage.completeJob(result('a', 'acct-1', '2024-01-01T00:00:09.000Z'), '2024-01-01T00:00:09.000Z', null),
      InvalidStageTransitionError,
    );
    assert.equal(await storage.loadResult('a'), null);
  });

  it('leaves results of jobs that did not complete out of the history', async () => {
    const storage = new InMemoryStorageAdapter();
    await storage.saveJob({ ...job('a', '2024-01-01T00:00:00.000Z'), stage: 'Failed' });
    await storage.saveResult(result('a', 'acct-1', '2024-01-01T00:00:00.000Z'));

    assert.deepEqual(await storage.loadAccountHistory('acct-1'), []);
    assert.equal(await storage.loadLatestSummary('acct-1'), null);
  });
});

describe('InMemoryObjectStorage', () => {
  it('records the stored byte size and fails for unknown uploads', async () => {
    const objects = new InMemoryObjectStorage();
    await objects.putFile(
      { id: 'u1', accountId: 'acct-1', format: 'csv', byteSize: 0, uploadedAt: '2024-01-01T00:00:00.000Z' },
      Buffer.from('abc'),
    );

    assert.equal((await objects.describeUpload('u1'))?.byteSize, 3);
    assert.equal((await objects.fetchFile('u1')).toString('utf-8'), 'abc');
    assert.equal(await objects.describeUpload('u2'), null);
    await assert.rejects(objects.fetchFile('u2'), /Upload u2 not found/);
  });
});
