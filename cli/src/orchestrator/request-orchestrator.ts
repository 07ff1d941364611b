/**
 * Top-level request pipeline.
 *
 * Reads the editing context, sends it, animates the loading surface and
 * renders the decoded answer. `run()` returns as soon as the request is
 * dispatched; the rest happens when the request process exits.
 */

import type { IConfig } from '../config/i-config.js';
import type { ICredentialProvider } from '../config/credential-provider.js';
import type { IDisplay } from '../display/i-display.js';
import type {
  IProcessRunner,
  ProcessInvocation,
  ProcessOutput,
} from '../process/i-process-runner.js';
import {
  buildRequestInvocation,
  buildRequestPayload,
  redactApiKey,
} from '../request/request-payload.js';
import {
  decodeResponse,
  type DecodedResult,
} from '../response/response-decoder.js';
import type { ISurfaceHost } from '../surface/i-surface.js';
import { ResultSurfaceController } from '../surface/result-surface-controller.js';
import {
  SpinnerController,
  type SpinnerHandle,
} from '../surface/spinner-controller.js';
import type { IEditingContext } from './editing-context.js';

/**
 * Outcome of a finished request.
 */
export interface RequestCompletion {
  readonly result: DecodedResult;
  readonly exitCode: number;
  /** False when the surface was gone before the result arrived. */
  readonly rendered: boolean;
  readonly controller: ResultSurfaceController;
}

/**
 * What `run()` did.
 */
export type RequestTicket =
  | { readonly status: 'aborted'; readonly reason: 'missing-credential' }
  | {
      readonly status: 'dispatched';
      readonly controller: ResultSurfaceController;
      readonly completion: Promise<RequestCompletion>;
    };

/**
 * Collaborators injected into the orchestrator.
 */
export interface RequestOrchestratorDependencies {
  config: IConfig;
  context: IEditingContext;
  credentials: ICredentialProvider;
  runner: IProcessRunner;
  host: ISurfaceHost;
  display: IDisplay;
  spinner?: SpinnerController;
  verbose?: boolean;
}

/**
 * Wires the spinner, process runner, decoder and result surface together.
 */
export class RequestOrchestrator {
  private readonly spinner: SpinnerController;

  constructor(private readonly deps: RequestOrchestratorDependencies) {
    this.spinner =
      deps.spinner ?? new SpinnerController(deps.config.spinner.interval);
  }

  /**
   * Send the editing context and render the answer when it arrives.
   *
   * Without an API key nothing is launched: one warning is shown and the
   * ticket is `aborted`.
   */
  run(): RequestTicket {
    const { config, credentials, display } = this.deps;

    const apiKey = credentials.getApiKey();
    if (apiKey === undefined || apiKey === '') {
      display.showWarning(
        `${credentials.describe()} is missing from your environment. No request was sent.`
      );
      return { status: 'aborted', reason: 'missing-credential' };
    }

    const payload = buildRequestPayload(this.deps.context.readText());
    const invocation = buildRequestInvocation(
      config.api,
      config.transport,
      apiKey,
      payload
    );

    if (this.deps.verbose) {
      display.showMessage(
        `Running: ${invocation.command} ${redactApiKey(invocation.args, apiKey).join(' ')}`
      );
    }

    const controller = ResultSurfaceController.open(this.deps.host, {
      surface: config.surface,
      keymap: config.keymap,
    });
    const spinnerHandle = this.spinner.start(controller.surface);

    const completion = this.complete(invocation, controller, spinnerHandle);

    return { status: 'dispatched', controller, completion };
  }

  private async complete(
    invocation: ProcessInvocation,
    controller: ResultSurfaceController,
    spinnerHandle: SpinnerHandle
  ): Promise<RequestCompletion> {
    let output: ProcessOutput;
    try {
      output = await this.deps.runner.run(invocation);
    } finally {
      // Nothing may write a frame once rendering starts
      this.spinner.stop(spinnerHandle);
    }

    const result = decodeResponse(output);
    const rendered = controller.present(result);
    return { result, exitCode: output.exitCode, rendered, controller };
  }
}
