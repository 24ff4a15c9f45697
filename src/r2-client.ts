/**
 * Cloudflare R2 Storage Client Configuration
 *
 * Optional mirror for generated artifacts. When every R2 variable is set,
 * each artifact the service produces is also uploaded to the bucket and its
 * public URL is handed back to the client. Local outputs still expire with
 * the sweep; mirrored objects are not deleted by this service.
 */

import { readFile } from 'node:fs/promises';
import { S3Client, PutObjectCommand, HeadBucketCommand } from '@aws-sdk/client-s3';
import type { ArtifactHandle } from './artifact-store.js';

export interface R2Settings {
  accountId?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  bucketName?: string;
  publicUrl?: string;
}

type ResolvedR2Settings = Required<R2Settings>;

/**
 * The two bucket calls the mirror needs. The S3 implementation lives below;
 * tests provide their own.
 */
export interface ObjectUploader {
  putObject(key: string, body: Buffer, contentType: string): Promise<void>;
  headBucket(): Promise<void>;
}

export interface ArtifactMirror {
  readonly bucketName: string;
  publish(artifact: ArtifactHandle): Promise<string>;
  testConnection(): Promise<boolean>;
}

export function validateR2Config(settings: R2Settings): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!settings.accountId) errors.push('R2_ACCOUNT_ID is not set');
  if (!settings.accessKeyId) errors.push('R2_ACCESS_KEY_ID is not set');
  if (!settings.secretAccessKey) errors.push('R2_SECRET_ACCESS_KEY is not set');
  if (!settings.bucketName) errors.push('R2_BUCKET_NAME is not set');
  if (!settings.publicUrl) errors.push('R2_PUBLIC_URL is not set');

  return {
    valid: errors.length === 0,
    errors,
  };
}

function resolveSettings(settings: R2Settings): ResolvedR2Settings | null {
  const { accountId, accessKeyId, secretAccessKey, bucketName, publicUrl } = settings;
  if (!accountId || !accessKeyId || !secretAccessKey || !bucketName || !publicUrl) {
    return null;
  }
  return { accountId, accessKeyId, secretAccessKey, bucketName, publicUrl };
}

/**
 * Generates a storage key for an artifact
 * @param artifactId - The artifact ID
 * @param fileName - The suggested download name
 */
export function generateR2Key(artifactId: string, fileName: string): string {
  return `artifacts/${artifactId}/${fileName}`;
}

export function createS3Uploader(settings: ResolvedR2Settings): ObjectUploader {
  // S3 client configured for Cloudflare R2
  const client = new S3Client({
    region: 'auto',
    endpoint: `https://${settings.accountId}.r2.cloudflarestorage.com`,
    credentials: {
      accessKeyId: settings.accessKeyId,
      secretAccessKey: settings.secretAccessKey,
    },
  });

  return {
    async putObject(key, body, contentType) {
      await client.send(
        new PutObjectCommand({
          Bucket: settings.bucketName,
          Key: key,
          Body: body,
          ContentType: contentType,
        }),
      );
    },
    async headBucket() {
      await client.send(new HeadBucketCommand({ Bucket: settings.bucketName }));
    },
  };
}

/**
 * Builds the artifact mirror, or returns null (with the missing variables
 * logged) when R2 is not fully configured.
 */
export function createR2Mirror(
  settings: R2Settings,
  makeUploader: (resolved: ResolvedR2Settings) => ObjectUploader = createS3Uploader,
): ArtifactMirror | null {
  const resolved = resolveSettings(settings);
  if (!resolved) {
    const { errors } = validateR2Config(settings);
    console.info(`[r2] Artifact mirror disabled (${errors.join(', ')})`);
    return null;
  }

  const uploader = makeUploader(resolved);
  const publicUrl = resolved.publicUrl.replace(/\/+$/, '');

  return {
    bucketName: resolved.bucketName,

    async publish(artifact) {
      const key = generateR2Key(artifact.id, artifact.downloadName);
      const body = await readFile(artifact.path);
      await uploader.putObject(key, body, artifact.mimeType);
      return `${publicUrl}/${key}`;
    },

    async testConnection() {
      try {
        await uploader.headBucket();
        console.log(`✓ R2 connection successful: ${resolved.bucketName}`);
        return true;
      } catch (error) {
        console.error(`✗ R2 connection failed:`, error instanceof Error ? error.message : String(error));
        return false;
      }
    },
  };
}
