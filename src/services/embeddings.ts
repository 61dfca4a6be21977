import { GoogleGenerativeAI } from "@google/generative-ai";
import { l2Normalize } from "../utils/vector";

export interface Embedder {
  embedMany(texts: string[]): Promise<number[][]>;
}

export type EmbedderOptions = {
  apiKey?: string;
  model?: string;
  /** Dimension of the offline hashing embedder used when no api key is set. */
  fallbackDim?: number;
};

// Deterministic FNV-1a bucket hashing; stable across runs, not semantic.
export function fauxEmbed(text: string, dim = 256): number[] {
  const v: number[] = new Array(dim).fill(0);
  let h = 2166136261 >>> 0;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 16777619) >>> 0;
    v[h % dim] += 1;
  }
  return l2Normalize(v);
}

export function createEmbedder(opts: EmbedderOptions = {}): Embedder {
  const { apiKey, model = "text-embedding-004", fallbackDim = 256 } = opts;
  const hasKey = typeof apiKey === "string" && apiKey.length > 0;

  // Lazy init client
  let client: GoogleGenerativeAI | null = null;
  function getClient() {
    if (!client) client = new GoogleGenerativeAI(apiKey ?? "");
    return client;
  }

  return {
    async embedMany(texts) {
      if (!hasKey) return texts.map((t) => fauxEmbed(t, fallbackDim));
      const embeddingModel = getClient().getGenerativeModel({ model });
      const vectors: number[][] = [];
      for (const text of texts) {
        const res = await embeddingModel.embedContent(text);
        if (!res.embedding?.values?.length) throw new Error("Embedding response missing values");
        vectors.push(res.embedding.values);
      }
      return vectors;
    },
  };
}
