import { stat } from 'node:fs/promises';
import { z } from 'zod';
import { SINGLE_PDF, defineOperation, jsonOutput } from './define.js';

export const info = defineOperation({
  tool: 'info',
  failurePrefix: 'Could not read PDF info',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({}),
  async transform({ inputs: [input], registry }) {
    const details = await registry.engine('pdf').readDocumentInfo(input.path);
    const { size } = await stat(input.path);
    return jsonOutput({ ...details, file_size: size });
  },
});
