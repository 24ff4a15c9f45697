import { Router, type Request, type Response, type NextFunction } from 'express';
import multer from 'multer';
import type { ToolName } from './capabilities.js';
import { STATUS_BY_KIND } from './errors.js';
import { OPERATIONS, type FormFields, type Operation, type TransformOutput } from './operations/index.js';
import { runPipeline, type IncomingFile, type PipelineDeps } from './pipeline.js';
import type { ArtifactMirror } from './r2-client.js';

export interface RouterDependencies extends PipelineDeps {
  maxUploadBytes: number;
  mirror: ArtifactMirror | null;
}

/** URL path under /api → operation. */
export const ENDPOINTS: ReadonlyArray<readonly [path: string, tool: ToolName]> = [
  ['/merge', 'merge'],
  ['/split', 'split'],
  ['/compress', 'compress'],
  ['/rotate', 'rotate'],
  ['/extract', 'extract'],
  ['/remove-pages', 'remove_pages'],
  ['/page-numbers', 'page_numbers'],
  ['/watermark', 'watermark'],
  ['/protect', 'protect'],
  ['/unlock', 'unlock'],
  ['/images-to-pdf', 'images_to_pdf'],
  ['/jpg-to-pdf', 'jpg_to_pdf'],
  ['/pdf-to-jpg', 'pdf_to_jpg'],
  ['/info', 'info'],
];

const MAX_FILES = 100;

function formFields(body: unknown): FormFields {
  const fields: FormFields = {};
  if (typeof body !== 'object' || body === null) return fields;

  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      fields[key] = value;
    } else if (Array.isArray(value) && typeof value[0] === 'string') {
      fields[key] = value[0];
    }
  }
  return fields;
}

function uploadedFiles(req: Request, operation: Operation): IncomingFile[] {
  const files = Array.isArray(req.files) ? req.files : [];
  const matching = files.filter((file) => file.fieldname === operation.input.field);
  const selected = operation.input.field === 'file' ? matching.slice(0, 1) : matching;

  return selected.map((file) => ({ originalName: file.originalname, content: file.buffer }));
}

function sendDownload(res: Response, path: string, downloadName: string): Promise<void> {
  return new Promise((resolve, reject) => {
    res.download(path, downloadName, (error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

function responderFor(res: Response, mirror: ArtifactMirror | null) {
  return async (output: TransformOutput): Promise<void> => {
    if (output.kind === 'json') {
      res.json(output.body);
      return;
    }

    const { artifact, headers } = output;
    for (const [name, value] of Object.entries(headers)) {
      res.setHeader(name, value);
    }

    if (mirror) {
      try {
        res.setHeader('X-Artifact-Url', await mirror.publish(artifact));
      } catch (error) {
        console.error(`[r2] Could not mirror ${artifact.downloadName}:`, error instanceof Error ? error.message : String(error));
      }
    }

    res.type(artifact.mimeType);
    await sendDownload(res, artifact.path, artifact.downloadName);
  };
}

export function createOperationsRouter(deps: RouterDependencies): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.maxUploadBytes, files: MAX_FILES },
  });

  for (const [path, tool] of ENDPOINTS) {
    const operation = OPERATIONS[tool];

    router.post(path, upload.any(), (req: Request, res: Response, next: NextFunction) => {
      // The body limit may already have answered while multer was finishing.
      if (res.headersSent) return;

      const request = { files: uploadedFiles(req, operation), fields: formFields(req.body) };

      runPipeline(operation, request, deps, responderFor(res, deps.mirror))
        .then((outcome) => {
          if (outcome.state === 'RESPONDED') return;
          if (res.headersSent) {
            res.end();
            return;
          }
          res.status(STATUS_BY_KIND[outcome.error.kind]).json({ error: outcome.error.message });
        })
        .catch(next);
    });
  }

  return router;
}
