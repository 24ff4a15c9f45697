import type { z } from 'zod';
import type { ArtifactHandle, UploadHandle } from '../artifact-store.js';
import type { CapabilityRegistry, ToolName } from '../capabilities.js';
import { fail, ok, type Result } from '../errors.js';

export type FormFields = Record<string, string>;

export interface TransformContext {
  inputs: readonly UploadHandle[];
  registry: CapabilityRegistry;
  /** Allocates an output the pipeline releases again if the request fails. */
  output(extension: string, mimeType: string, downloadName: string): ArtifactHandle;
}

export type TransformOutput =
  | { kind: 'artifact'; artifact: ArtifactHandle; headers: Record<string, string> }
  | { kind: 'json'; body: unknown };

export type BoundTransform = (context: TransformContext) => Promise<Result<TransformOutput>>;

export interface InputRule {
  /** Multipart field the uploads arrive in. */
  field: 'file' | 'files';
  min: number;
  missingMessage: string;
  tooFewMessage?: string;
}

export interface OperationSpec<TOptions> {
  tool: ToolName;
  /** Prefix for errors thrown by the underlying library, e.g. "Merge failed". */
  failurePrefix: string;
  input: InputRule;
  pdfOnly: boolean;
  options: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  transform(context: TransformContext, options: TOptions): Promise<Result<TransformOutput>>;
}

export interface Operation {
  readonly tool: ToolName;
  readonly failurePrefix: string;
  readonly input: InputRule;
  readonly pdfOnly: boolean;
  /** Parses the form fields and binds them to the transform. */
  prepare(fields: FormFields): Result<BoundTransform>;
}

export const PDF_MIME = 'application/pdf';
export const ZIP_MIME = 'application/zip';

export const SINGLE_PDF: InputRule = { field: 'file', min: 1, missingMessage: 'No file uploaded.' };

export function defineOperation<TOptions>(spec: OperationSpec<TOptions>): Operation {
  return {
    tool: spec.tool,
    failurePrefix: spec.failurePrefix,
    input: spec.input,
    pdfOnly: spec.pdfOnly,

    prepare(fields) {
      const parsed = spec.options.safeParse(fields);
      if (!parsed.success) {
        return fail('validation', parsed.error.issues[0]?.message ?? 'Invalid request.');
      }

      const options = parsed.data;
      return ok((context: TransformContext) => spec.transform(context, options));
    },
  };
}

export function artifactOutput(artifact: ArtifactHandle, headers: Record<string, string> = {}): Result<TransformOutput> {
  return ok<TransformOutput>({ kind: 'artifact', artifact, headers });
}

export function jsonOutput(body: unknown): Result<TransformOutput> {
  return ok<TransformOutput>({ kind: 'json', body });
}
