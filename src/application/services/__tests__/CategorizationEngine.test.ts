import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { makeTransaction, testCatalog } from '../../../__tests__/fixtures.js';
import { Transaction } from '../../../domain/entities/Transaction.js';
import { CancelledError, ClassifierUnavailableError } from '../../../domain/errors/AnalysisErrors.js';
import { CategoryProviderPort, CategorySuggestion } from '../../ports/CategoryProviderPort.js';
import { CategorizationEngine } from '../CategorizationEngine.js';

interface ScriptedProvider extends CategoryProviderPort {
  calls: string[];
}

const scripted = (name: string, answer: (txn: Transaction) => CategorySuggestion | null): ScriptedProvider => {
  const calls: string[] = [];
  return {
    name,
    calls,
    suggest: async (txn) => {
      calls.push(txn.merchant);
      return answer(txn);
    },
  };
};

const settings = { confidenceThreshold: 0.9, concurrency: 2, cacheSize: 100 };

describe('CategorizationEngine', () => {
  it('stops at the first confident suggestion', async () => {
    const rules = scripted('rules', () => ({ category: 'Food & Dining', confidence: 0.95 }));
    const classifier = scripted('classifier', () => ({ category: 'Shopping', confidence: 0.99 }));
    const engine = new CategorizationEngine([rules, classifier], testCatalog(), settings);

    const result = await engine.categorize(makeTransaction({ merchant: 'STARBUCKS' }));

    assert.deepEqual(result, { category: 'Food & Dining', confidence: 0.95, source: 'rules' });
    assert.deepEqual(classifier.calls, []);
  });

  it('falls back to the last provider that answered when nobody is confident', async () => {
    const rules = scripted('rules', () => ({ category: 'Food & Dining', confidence: 0.75 }));
    const classifier = scripted('classifier', () => ({ category: 'Shopping', confidence: 0.6 }));
    const engine = new CategorizationEngine([rules, classifier], testCatalog(), settings);

    const result = await engine.categorize(makeTransaction({ merchant: 'CORNER SHOP' }));

    assert.deepEqual(result, { category: 'Shopping', confidence: 0.6, source: 'classifier' });
  });

  it('ignores labels outside the catalog', async () => {
    const rules = scripted('rules', () => ({ category: 'Food & Dining', confidence: 0.75 }));
    const classifier = scripted('classifier', () => ({ category: 'Crypto', confidence: 0.97 }));
    const engine = new CategorizationEngine([rules, classifier], testCatalog(), settings);

    const result = await engine.categorize(makeTransaction({ merchant: 'BEAN HOUSE' }));

    assert.deepEqual(result, { category: 'Food & Dining', confidence: 0.75, source: 'rules' });
  });

  it('returns Uncategorized with zero confidence when no provider answers', async () => {
    const engine = new CategorizationEngine(
      [scripted('rules', () => null), scripted('classifier', () => null)],
      testCatalog(),
      settings,
    );

    const result = await engine.categorize(makeTransaction({ merchant: 'MYSTERY LLC' }));

    assert.deepEqual(result, { category: 'Uncategorized', confidence: 0, source: 'default' });
  });

  it('caches by merchant', async () => {
    const classifier = scripted('classifier', () => ({ category: 'Transportation', confidence: 0.8 }));
    const engine = new CategorizationEngine([classifier], testCatalog(), settings);

    await engine.categorize(makeTransaction({ id: 'a', merchant: 'CITY CABS' }));
    await engine.categorize(makeTransaction({ id: 'b', merchant: 'CITY CABS' }));

    assert.deepEqual(classifier.calls, ['CITY CABS']);
  });

  it('does not reuse description-based answers or Uncategorized for the same merchant', async () => {
    const rules = scripted('rules', (txn) =>
      txn.description.includes('PARKING') ? { category: 'Transportation', confidence: 0.75, basis: 'description' } : null,
    );
    const engine = new CategorizationEngine([rules], testCatalog(), settings);

    const parking = await engine.categorize(
      makeTransaction({ id: 'a', merchant: 'CITY GARAGE', description: 'CITY GARAGE PARKING' }),
    );
    const carWash = await engine.categorize(
      makeTransaction({ id: 'b', merchant: 'CITY GARAGE', description: 'CITY GARAGE CAR WASH' }),
    );
    await engine.categorize(makeTransaction({ id: 'c', merchant: 'CITY GARAGE', description: 'CITY GARAGE CAR WASH' }));

    assert.deepEqual(parking, { category: 'Transportation', confidence: 0.75, source: 'rules' });
    assert.deepEqual(carWash, { category: 'Uncategorized', confidence: 0, source: 'default' });
    assert.deepEqual(rules.calls, ['CITY GARAGE', 'CITY GARAGE', 'CITY GARAGE']);
  });

  it('forgets the least recently used merchant once the cache is full', async () => {
    const classifier = scripted('classifier', () => ({ category: 'Shopping', confidence: 0.8 }));
    const engine = new CategorizationEngine([classifier], testCatalog(), { ...settings, cacheSize: 2 });

    for (const merchant of ['ALPHA', 'BRAVO', 'ALPHA', 'CHARLIE', 'ALPHA', 'BRAVO']) {
      await engine.categorize(makeTransaction({ merchant }));
    }

    assert.deepEqual(classifier.calls, ['ALPHA', 'BRAVO', 'CHARLIE', 'BRAVO']);
  });

  it('lets backend failures propagate and does not cache them', async () => {
    let failures = 0;
    const classifier: CategoryProviderPort = {
      name: 'classifier',
      suggest: async () => {
        failures += 1;
        if (failures === 1) {
          throw new ClassifierUnavailableError('classifier timed out');
        }
        return { category: 'Shopping', confidence: 0.7 };
      },
    };
    const engine = new CategorizationEngine([classifier], testCatalog(), settings);
    const txn = makeTransaction({ merchant: 'GADGET HUT' });

    await assert.rejects(engine.categorize(txn), ClassifierUnavailableError);
    assert.deepEqual(await engine.categorize(txn), { category: 'Shopping', confidence: 0.7, source: 'classifier' });
  });

  it('categorizes a batch in input order', async () => {
    const rules = scripted('rules', (txn) =>
      txn.merchant.includes('UBER') ? { category: 'Transportation', confidence: 0.95 } : null,
    );
    const engine = new CategorizationEngine([rules], testCatalog(), settings);

    const categorized = await engine.categorizeAll([
      makeTransaction({ id: 'a', merchant: 'UBER TRIP' }),
      makeTransaction({ id: 'b', merchant: 'UNKNOWN SHOP' }),
      makeTransaction({ id: 'c', merchant: 'UBER EATS' }),
    ]);

    assert.deepEqual(
      categorized.map((txn) => [txn.id, txn.category, txn.categoryConfidence, txn.categorySource]),
      [
        ['a', 'Transportation', 0.95, 'rules'],
        ['b', 'Uncategorized', 0, 'default'],
        ['c', 'Transportation', 0.95, 'rules'],
      ],
    );
  });

  it('refuses to run once the job is cancelled', async () => {
    const rules = scripted('rules', () => ({ category: 'Shopping', confidence: 0.95 }));
    const engine = new CategorizationEngine([rules], testCatalog(), settings);
    const controller = new AbortController();
    controller.abort(new CancelledError('job-1'));

    await assert.rejects(engine.categorizeAll([makeTransaction()], { signal: controller.signal }), CancelledError);
    assert.deepEqual(rules.calls, []);
  });
});
