import { z } from "zod";

/**
 * Vocabulary payload produced by the extractor and cached verbatim.
 * Unknown top-level fields are kept so extractor output round-trips.
 */
export const vocabularyPartSchema = z.object({
  kanji: z.string(),
  romaji: z.array(z.string()),
});

export const vocabularyItemSchema = z.object({
  kanji: z.string(),
  romaji: z.string(),
  english: z.string(),
  parts: z.array(vocabularyPartSchema),
});

export const vocabularyPayloadSchema = z
  .object({
    vocabulary: z.array(vocabularyItemSchema),
  })
  .passthrough();

export type VocabularyItem = z.infer<typeof vocabularyItemSchema>;
export type VocabularyPayload = z.infer<typeof vocabularyPayloadSchema>;

/**
 * Derives vocabulary from lyrics (language-model backed in production)
 */
export interface VocabExtractor {
  readonly name: string;
  /** Resolves null when nothing could be extracted */
  extract(lyrics: string): Promise<VocabularyPayload | null>;
}
