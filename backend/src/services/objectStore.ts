import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { config } from "../config.js";
import { sha256Hex } from "../lib/crypto.js";
import { CollaboratorError, toCollaboratorError } from "../lib/errors.js";

export interface PutResult {
  key: string;
  checksum: string;
}

export interface ObjectStore {
  put(studentId: string, objectName: string, bytes: Buffer, contentType: string, signal?: AbortSignal): Promise<PutResult>;
  getPresignedUrl(studentId: string, objectName: string, ttlSeconds: number): Promise<string>;
}

export interface S3ObjectStoreOptions {
  bucket: string;
  client?: S3Client;
}

export const buildObjectKey = (studentId: string, objectName: string): string => `${studentId}/${objectName}`;

export const createS3Client = (): S3Client =>
  new S3Client({
    region: config.S3_REGION,
    endpoint: config.S3_ENDPOINT || undefined,
    forcePathStyle: config.S3_FORCE_PATH_STYLE,
    credentials:
      config.S3_ACCESS_KEY && config.S3_SECRET_KEY
        ? { accessKeyId: config.S3_ACCESS_KEY, secretAccessKey: config.S3_SECRET_KEY }
        : undefined,
  });

export const createS3ObjectStore = ({ bucket, client = createS3Client() }: S3ObjectStoreOptions): ObjectStore => {
  const requireBucket = (): string => {
    if (!bucket) {
      throw new CollaboratorError("objectStore", "S3_BUCKET is not configured");
    }
    return bucket;
  };

  const put = async (
    studentId: string,
    objectName: string,
    bytes: Buffer,
    contentType: string,
    signal?: AbortSignal,
  ): Promise<PutResult> => {
    const key = buildObjectKey(studentId, objectName);
    const checksum = sha256Hex(bytes);
    try {
      await client.send(
        new PutObjectCommand({
          Bucket: requireBucket(),
          Key: key,
          Body: bytes,
          ContentType: contentType,
          ContentLength: bytes.length,
          ChecksumSHA256: Buffer.from(checksum, "hex").toString("base64"),
        }),
        { abortSignal: signal },
      );
    } catch (error) {
      throw toCollaboratorError(error, "objectStore");
    }
    return { key, checksum };
  };

  const getPresignedUrl = async (studentId: string, objectName: string, ttlSeconds: number): Promise<string> => {
    const command = new GetObjectCommand({ Bucket: requireBucket(), Key: buildObjectKey(studentId, objectName) });
    try {
      return await getSignedUrl(client, command, { expiresIn: ttlSeconds });
    } catch (error) {
      throw toCollaboratorError(error, "objectStore");
    }
  };

  return { put, getPresignedUrl };
};
