import type { MemoryExample } from "../types";

export interface StyleMemoryLike {
  saveExample(example: MemoryExample): void;
  getSimilarExamples(queryTitle: string, topK?: number): MemoryExample[];
}

const wordPattern = /[\p{L}\p{N}_]+/gu;

export const tokenizeTitle = (title: string): Set<string> => new Set(title.toLowerCase().match(wordPattern) ?? []);

export const scoreTitleSimilarity = (queryTitle: string, candidateTitle: string): number => {
  const query = queryTitle.toLowerCase();
  const candidate = candidateTitle.toLowerCase();
  const candidateTokens = tokenizeTitle(candidate);

  let overlap = 0;
  for (const token of tokenizeTitle(query)) {
    if (candidateTokens.has(token)) overlap += 1;
  }

  const substringBonus = candidate.includes(query) || query.includes(candidate) ? 1 : 0;
  return overlap + substringBonus;
};

export class StyleMemory implements StyleMemoryLike {
  private readonly examples: MemoryExample[] = [];

  saveExample(example: MemoryExample): void {
    this.examples.push(structuredClone(example));
  }

  getSimilarExamples(queryTitle: string, topK = 3): MemoryExample[] {
    if (this.examples.length === 0 || topK <= 0) {
      return [];
    }

    return this.examples
      .map((example) => ({ example, score: scoreTitleSimilarity(queryTitle, example.title) }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, topK)
      .map((entry) => structuredClone(entry.example));
  }

  getAllExamples(): MemoryExample[] {
    return this.examples.map((example) => structuredClone(example));
  }

  clear(): void {
    this.examples.length = 0;
  }

  get size(): number {
    return this.examples.length;
  }
}
