import { z } from 'zod';
import policyDocumentsJson from './data/policy-documents.json';
import type { ReferenceSnippet } from './types';

export interface RetrievalQuery {
  query: string;
  accountId?: string;
  debtorId?: string;
  topK: number;
}

/** Source of reference material for the generator. Failures are never fatal to a turn. */
export interface ContextRetriever {
  retrieve(query: RetrievalQuery): Promise<ReferenceSnippet[]>;
}

const policyDocumentSchema = z.object({
  source: z.string(),
  title: z.string(),
  keywords: z.array(z.string()),
  content: z.string()
});

export type PolicyDocument = z.infer<typeof policyDocumentSchema>;

export const DEFAULT_POLICY_DOCUMENTS: readonly PolicyDocument[] = z.array(policyDocumentSchema).parse(policyDocumentsJson);

const tokenize = (text: string) => text.toLowerCase().match(/[a-z0-9]+/g) ?? [];

/**
 * Ranks policy documents by how many of their keywords appear in the query.
 * Documents with no keyword hit are not returned.
 */
export class KeywordPolicyRetriever implements ContextRetriever {
  constructor(private readonly documents: readonly PolicyDocument[] = DEFAULT_POLICY_DOCUMENTS) {}

  async retrieve({ query, topK }: RetrievalQuery): Promise<ReferenceSnippet[]> {
    const tokens = new Set(tokenize(query));
    if (tokens.size === 0 || topK <= 0) return [];

    return this.documents
      .map((doc) => {
        const hits = doc.keywords.filter((k) => tokens.has(k.toLowerCase())).length;
        return { source: doc.source, content: doc.content, score: hits / doc.keywords.length };
      })
      .filter((snippet) => snippet.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }
}

export class NoopRetriever implements ContextRetriever {
  async retrieve(): Promise<ReferenceSnippet[]> {
    return [];
  }
}
