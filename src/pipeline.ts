import type { Readable } from 'node:stream';
import type { ArtifactHandle, ArtifactStore, UploadHandle } from './artifact-store.js';
import type { CapabilityRegistry, ToolName } from './capabilities.js';
import { describeError, fail, type OperationError, type Result } from './errors.js';
import type { BoundTransform, FormFields, Operation, TransformContext, TransformOutput } from './operations/define.js';

/** States a request can fail from. */
export type ActiveState = 'RECEIVED' | 'VALIDATED' | 'STORED' | 'TRANSFORMED';

export interface IncomingFile {
  originalName: string;
  content: Buffer | Readable;
}

export interface OperationRequest {
  files: readonly IncomingFile[];
  fields: FormFields;
}

export interface PipelineDeps {
  store: ArtifactStore;
  registry: CapabilityRegistry;
}

export type Responder = (output: TransformOutput) => Promise<void>;

export type PipelineOutcome =
  | { state: 'RESPONDED'; tool: ToolName }
  | { state: 'FAILED'; tool: ToolName; failedAt: ActiveState; error: OperationError };

function validate(operation: Operation, request: OperationRequest, registry: CapabilityRegistry): Result<BoundTransform> {
  const unavailable = registry.unavailableMessage(operation.tool);
  if (unavailable) return fail('capability_unavailable', unavailable);

  const { files } = request;
  const rule = operation.input;
  if (files.length === 0) return fail('not_found', rule.missingMessage);
  if (files.length < rule.min) return fail('validation', rule.tooFewMessage ?? rule.missingMessage);

  if (operation.pdfOnly) {
    const notPdf = files.find((file) => !file.originalName.toLowerCase().endsWith('.pdf'));
    if (notPdf) return fail('validation', `"${notPdf.originalName}" is not a PDF file.`);
  }

  return operation.prepare(request.fields);
}

async function releaseAll(store: ArtifactStore, handles: readonly UploadHandle[]): Promise<void> {
  const results = await Promise.allSettled(handles.map((handle) => store.release(handle)));
  for (const result of results) {
    if (result.status === 'rejected') {
      console.error('[pipeline] Could not release scratch file:', describeError(result.reason));
    }
  }
}

async function execute(
  operation: Operation,
  request: OperationRequest,
  deps: PipelineDeps,
  respond: Responder,
): Promise<PipelineOutcome> {
  const { store, registry } = deps;
  const inputs: UploadHandle[] = [];
  const outputs: ArtifactHandle[] = [];
  let state: ActiveState = 'RECEIVED';

  const failed = (error: OperationError): PipelineOutcome => ({ state: 'FAILED', tool: operation.tool, failedAt: state, error });

  try {
    const transform = validate(operation, request, registry);
    if (!transform.ok) return failed(transform.error);
    state = 'VALIDATED';

    for (const file of request.files) {
      try {
        inputs.push(await store.save(file.content, file.originalName));
      } catch (error) {
        return failed({ kind: 'storage', message: `Could not store upload: ${describeError(error)}` });
      }
    }
    state = 'STORED';

    const context: TransformContext = {
      inputs,
      registry,
      output(extension, mimeType, downloadName) {
        const artifact = store.allocateOutput(extension, mimeType, downloadName);
        outputs.push(artifact);
        return artifact;
      },
    };

    let result: Result<TransformOutput>;
    try {
      result = await transform.value(context);
    } catch (error) {
      result = fail('transform', `${operation.failurePrefix}: ${describeError(error)}`);
    }
    if (!result.ok) {
      await releaseAll(store, outputs);
      return failed(result.error);
    }
    state = 'TRANSFORMED';

    try {
      await respond(result.value);
    } catch (error) {
      await releaseAll(store, outputs);
      return failed({ kind: 'storage', message: `Could not send result: ${describeError(error)}` });
    }

    return { state: 'RESPONDED', tool: operation.tool };
  } finally {
    await releaseAll(store, inputs);
  }
}

/**
 * Runs one request through validate → store → transform → respond.
 *
 * Inputs saved for the request are always released before this resolves.
 * Outputs survive a successful response (the sweep expires them) and are
 * released on failure. Never rejects.
 */
export async function runPipeline(
  operation: Operation,
  request: OperationRequest,
  deps: PipelineDeps,
  respond: Responder,
): Promise<PipelineOutcome> {
  const started = Date.now();
  const outcome = await execute(operation, request, deps, respond);
  const elapsed = Date.now() - started;

  if (outcome.state === 'RESPONDED') {
    console.info(`[pipeline] ${outcome.tool} responded in ${elapsed}ms`);
  } else {
    console.error(`[pipeline] ${outcome.tool} failed at ${outcome.failedAt} (${outcome.error.kind}): ${outcome.error.message}`);
  }

  return outcome;
}
