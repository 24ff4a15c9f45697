import { z } from 'zod';
import { fail } from '../errors.js';
import { PDF_MIME, SINGLE_PDF, artifactOutput, defineOperation } from './define.js';

const MISSING_PASSWORD = 'Please provide a password.';

export const protect = defineOperation({
  tool: 'protect',
  failurePrefix: 'Protect failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({
    password: z.string({ required_error: MISSING_PASSWORD }).min(1, MISSING_PASSWORD),
  }),
  async transform({ inputs: [input], registry, output }, { password }) {
    const artifact = output('.pdf', PDF_MIME, 'protected.pdf');
    await registry.engine('security').encryptDocument(input.path, artifact.path, password);
    return artifactOutput(artifact);
  },
});

export const unlock = defineOperation({
  tool: 'unlock',
  failurePrefix: 'Unlock failed',
  input: SINGLE_PDF,
  pdfOnly: true,
  options: z.object({ password: z.string().default('') }),
  async transform({ inputs: [input], registry, output }, { password }) {
    const artifact = output('.pdf', PDF_MIME, 'unlocked.pdf');
    const outcome = await registry.engine('security').decryptDocument(input.path, artifact.path, password);

    if (outcome === 'wrong-password') {
      return fail('transform', 'Wrong password. Please enter the correct password.');
    }
    return artifactOutput(artifact);
  },
});
