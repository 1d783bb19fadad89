import { GoogleGenAI } from "@google/genai";

export const EMBEDDING_MODEL = "gemini-embedding-001";

/**
 * Gemini client for the embedding provider. Returns null without a key,
 * in which case the deterministic metric embedding is used.
 */
export function createGeminiClient(
  apiKey = process.env.GEMINI_API_KEY,
): GoogleGenAI | null {
  if (!apiKey) return null;
  return new GoogleGenAI({ apiKey });
}
