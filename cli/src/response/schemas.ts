/**
 * Zod schemas for generateContent responses.
 *
 * Only a non-empty `candidates` array is required. Every other field is read
 * leniently: a value of the wrong type is dropped by `.catch(undefined)` and
 * shows up as missing, and `.passthrough()` keeps fields this tool does not
 * read.
 */

import { z } from 'zod';

/**
 * A value shown in the metadata summary. Numbers and strings are printed as
 * they are; anything else reads as missing.
 */
export const MetaValueSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .catch(undefined);

export type MetaValue = z.infer<typeof MetaValueSchema>;

/**
 * Token counters. The API omits counters it did not compute.
 */
export const UsageMetadataSchema = z
  .object({
    promptTokenCount: MetaValueSchema,
    candidatesTokenCount: MetaValueSchema,
    totalTokenCount: MetaValueSchema,
  })
  .passthrough();

/**
 * One text part of a candidate's content.
 */
export const PartSchema = z
  .object({
    text: z.string().nullish().catch(undefined),
  })
  .passthrough();

/**
 * One proposed answer. Parts are checked one at a time with PartSchema.
 */
export const CandidateSchema = z
  .object({
    content: z
      .object({
        parts: z.array(z.unknown()).nullish().catch(undefined),
      })
      .passthrough()
      .nullish()
      .catch(undefined),
    finishReason: MetaValueSchema,
  })
  .passthrough();

export type Candidate = z.infer<typeof CandidateSchema>;

/**
 * Successful generateContent response. Candidates are checked one at a time
 * with CandidateSchema.
 */
export const GenerateContentResponseSchema = z
  .object({
    candidates: z.array(z.unknown()).nonempty(),
    modelVersion: MetaValueSchema,
    usageMetadata: UsageMetadataSchema.nullish().catch(undefined),
  })
  .passthrough();

export type GenerateContentResponse = z.infer<
  typeof GenerateContentResponseSchema
>;
