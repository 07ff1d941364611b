/**
 * Request construction for the generateContent endpoint.
 */

import type { IApiConfig, ITransportConfig } from '../config/i-config.js';
import type { ProcessInvocation } from '../process/i-process-runner.js';

/**
 * Request body for `models/<model>:generateContent`.
 */
export interface RequestPayload {
  readonly contents: readonly [
    {
      readonly parts: readonly [{ readonly text: string }];
    },
  ];
}

/**
 * Build the request body for a single prompt.
 *
 * The payload carries exactly one text part and is frozen all the way
 * down, so nothing can edit it once it has been handed to a request.
 *
 * @param text - Prompt text, sent verbatim
 */
export function buildRequestPayload(text: string): RequestPayload {
  const part = Object.freeze({ text });
  const content = Object.freeze({ parts: Object.freeze([part] as const) });
  return Object.freeze({ contents: Object.freeze([content] as const) });
}

/**
 * Build the endpoint URL, with the API key as the `key` query parameter.
 */
export function buildEndpointUrl(api: IApiConfig, apiKey: string): string {
  const model = encodeURIComponent(api.model);
  const key = encodeURIComponent(apiKey);
  return `https://${api.host}/${api.version}/models/${model}:generateContent?key=${key}`;
}

/**
 * Build the curl invocation for a payload.
 *
 * The body is passed on stdin (`--data-binary @-`) so prompt size is not
 * limited by the argument list.
 */
export function buildRequestInvocation(
  api: IApiConfig,
  transport: ITransportConfig,
  apiKey: string,
  payload: RequestPayload
): ProcessInvocation {
  return {
    command: transport.command,
    args: [
      '--silent',
      '--show-error',
      '-X',
      'POST',
      '-H',
      'Content-Type: application/json',
      '--data-binary',
      '@-',
      buildEndpointUrl(api, apiKey),
    ],
    stdin: JSON.stringify(payload),
    timeout: transport.timeout,
  };
}

/**
 * Replace the API key in a command line before it is shown to the user.
 */
export function redactApiKey(args: readonly string[], apiKey: string): string[] {
  const encoded = encodeURIComponent(apiKey);
  return args.map((arg) =>
    arg.split(encoded).join('***').split(apiKey).join('***')
  );
}
