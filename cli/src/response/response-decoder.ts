/**
 * Turns the buffered output of a request process into displayable text and
 * a metadata summary.
 */

import type { ProcessOutput } from '../process/i-process-runner.js';
import {
  CandidateSchema,
  GenerateContentResponseSchema,
  PartSchema,
  type Candidate,
  type GenerateContentResponse,
  type MetaValue,
} from './schemas.js';

/**
 * Decoded response, ready to render.
 */
export interface DecodedResult {
  /** Primary response text, or the decode-failure message. */
  readonly responseText: string;

  /** Two-line metadata summary, or the error diagnostic. */
  readonly meta: string;

  /** False when the fallback diagnostic was produced. */
  readonly ok: boolean;
}

export const NO_RESPONSE_TEXT = 'No response text found.';
export const NOT_AVAILABLE = 'N/A';
export const DECODE_FAILURE_PREFIX = 'Failed to decode response: ';
export const META_FAILURE_PREFIX = 'Error retrieving meta information. ';

/**
 * Decode a finished request.
 *
 * Never throws. Malformed JSON and a missing or empty candidates array
 * produce the fallback result, whose text carries the raw stdout and whose
 * meta carries stderr. Any other field of the wrong type reads as missing.
 */
export function decodeResponse(
  output: Pick<ProcessOutput, 'stdout' | 'stderr' | 'launchError'>
): DecodedResult {
  const rawText = output.stdout.join('\n');

  const response = parseResponse(rawText);
  if (!response) {
    const diagnostics = output.launchError
      ? [output.launchError, ...output.stderr]
      : output.stderr;
    return {
      responseText: DECODE_FAILURE_PREFIX + rawText,
      meta: META_FAILURE_PREFIX + diagnostics.join('\n'),
      ok: false,
    };
  }

  return {
    responseText: firstPartText(readCandidate(response)) ?? NO_RESPONSE_TEXT,
    meta: formatMeta(response),
    ok: true,
  };
}

/**
 * Format the metadata block for a successful response.
 *
 * @example
 * Finish Reason: STOP | Model Version: gemini-2.0-flash
 * Usage: Prompt tokens: 4, Candidate tokens: 12, Total tokens: 16
 */
export function formatMeta(response: GenerateContentResponse): string {
  const finishReason = show(readCandidate(response)?.finishReason);
  const modelVersion = show(response.modelVersion);
  const usage = response.usageMetadata;

  const usageInfo =
    `Prompt tokens: ${show(usage?.promptTokenCount)}, ` +
    `Candidate tokens: ${show(usage?.candidatesTokenCount)}, ` +
    `Total tokens: ${show(usage?.totalTokenCount)}`;

  return `Finish Reason: ${finishReason} | Model Version: ${modelVersion}\nUsage: ${usageInfo}`;
}

function parseResponse(rawText: string): GenerateContentResponse | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawText);
  } catch {
    return null;
  }

  const result = GenerateContentResponseSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

function readCandidate(
  response: GenerateContentResponse
): Candidate | undefined {
  const result = CandidateSchema.safeParse(response.candidates[0]);
  return result.success ? result.data : undefined;
}

function firstPartText(candidate: Candidate | undefined): string | undefined {
  const result = PartSchema.safeParse(candidate?.content?.parts?.[0]);
  return result.success ? (result.data.text ?? undefined) : undefined;
}

function show(value: MetaValue): string {
  return value === null || value === undefined ? NOT_AVAILABLE : String(value);
}
