import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { AnalysisJob, applyTransition, canTransition } from '../AnalysisJob.js';
import { InvalidStageTransitionError } from '../../errors/AnalysisErrors.js';

const createdJob = (): AnalysisJob => ({
  id: 'job-1',
  statementId: 'upload-1',
  accountId: 'acct-1',
  declaredFormat: 'csv',
  stage: 'Created',
  errorDetail: null,
  history: [{ stage: 'Created', enteredAt: '2024-01-01T00:00:00.000Z' }],
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
});

describe('job stage machine', () => {
  it('only moves one stage forward', () => {
    assert.equal(canTransition('Created', 'Extracting'), true);
    assert.equal(canTransition('Created', 'Normalizing'), false);
    assert.equal(canTransition('Categorizing', 'Extracting'), false);
    assert.equal(canTransition('Aggregating', 'Completed'), true);
  });

  it('allows failing from any non-terminal stage and nothing after a terminal one', () => {
    assert.equal(canTransition('Created', 'Failed'), true);
    assert.equal(canTransition('DetectingAnomalies', 'Failed'), true);
    assert.equal(canTransition('Completed', 'Failed'), false);
    assert.equal(canTransition('Failed', 'Failed'), false);
  });

  it('records stage and entry timestamp together', () => {
    const next = applyTransition(createdJob(), 'Extracting', '2024-01-01T00:00:05.000Z');

    assert.equal(next.stage, 'Extracting');
    assert.equal(next.updatedAt, '2024-01-01T00:00:05.000Z');
    assert.deepEqual(next.history[1], { stage: 'Extracting', enteredAt: '2024-01-01T00:00:05.000Z' });
  });

  it('throws on an illegal transition', () => {
    assert.throws(() => applyTransition(createdJob(), 'Completed', '2024-01-01T00:00:05.000Z'), InvalidStageTransitionError);
  });
});
