import { describe, it, expect } from 'vitest';
import { DEFAULT_POLICY_DOCUMENTS, KeywordPolicyRetriever, NoopRetriever } from '../../negotiation/context-retriever';

describe('KeywordPolicyRetriever', () => {
  const retriever = new KeywordPolicyRetriever();

  it('loads the bundled policy documents', () => {
    expect(DEFAULT_POLICY_DOCUMENTS.map((d) => d.source)).toEqual([
      'contact_rules',
      'payment_plans',
      'escalation',
      'verification',
      'debt_validation'
    ]);
  });

  it('scores documents by the share of keywords found in the query', async () => {
    const results = await retriever.retrieve({ query: 'Can I set up a monthly payment plan?', topK: 2 });

    expect(results.map((r) => [r.source, r.score])).toEqual([['payment_plans', 0.3]]);
  });

  it('returns the best matches first, up to topK', async () => {
    const query = 'I want to dispute this, where is the proof?';

    expect((await retriever.retrieve({ query, topK: 2 })).map((r) => r.source)).toEqual(['debt_validation', 'escalation']);
    expect((await retriever.retrieve({ query, topK: 1 })).map((r) => r.source)).toEqual(['debt_validation']);
  });

  it('returns nothing for an unrelated query', async () => {
    expect(await retriever.retrieve({ query: 'hello there', topK: 2 })).toEqual([]);
    expect(await new NoopRetriever().retrieve()).toEqual([]);
  });
});
