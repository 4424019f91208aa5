// Infrastructure: Avatar hosting on an S3-compatible bucket

import { PutObjectCommand, S3Client, type S3ClientConfig } from '@aws-sdk/client-s3';
import type { AvatarUpload, IAvatarStore } from '@/domain/avatar/types.js';
import type { AvatarStorageConfig } from '@/utils/config.js';

export function createS3Client(config: AvatarStorageConfig): S3Client {
  const s3Config: S3ClientConfig = { region: config.region };
  if (config.endpoint) {
    s3Config.endpoint = config.endpoint;
    s3Config.forcePathStyle = true;
  }
  if (config.accessKey && config.secretKey) {
    s3Config.credentials = {
      accessKeyId: config.accessKey,
      secretAccessKey: config.secretKey,
    };
  }
  return new S3Client(s3Config);
}

export class S3AvatarStore implements IAvatarStore {
  constructor(
    private client: S3Client,
    private bucket: string,
    private publicUrl: string
  ) {}

  /**
   * Same public id overwrites the previous image
   */
  async upload(image: AvatarUpload, publicId: string): Promise<string> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: publicId,
        Body: image.body,
        ContentType: image.contentType,
        CacheControl: 'no-cache',
      })
    );
    return `${this.publicUrl}/${publicId}`;
  }
}
