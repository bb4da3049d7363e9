import crypto from "node:crypto";

const IV_LENGTH = 12;
const FORMAT_VERSION = "v1";

const toKeyBuffer = (rawKey: string): Buffer => {
  const hash = crypto.createHash("sha256");
  hash.update(rawKey);
  return hash.digest();
};

export const encrypt = (value: string, rawKey: string): string => {
  const iv = crypto.randomBytes(IV_LENGTH);
  const cipher = crypto.createCipheriv("aes-256-gcm", toKeyBuffer(rawKey), iv);
  const encrypted = Buffer.concat([cipher.update(value, "utf8"), cipher.final()]);
  const authTag = cipher.getAuthTag();
  return [FORMAT_VERSION, iv.toString("base64url"), authTag.toString("base64url"), encrypted.toString("base64url")].join(":");
};

export const decrypt = (value: string, rawKey: string): string => {
  const [version, ivPart, tagPart, payloadPart] = value.split(":");
  if (version !== FORMAT_VERSION || !ivPart || !tagPart || payloadPart === undefined) {
    throw new Error("Encrypted token format is invalid");
  }
  const decipher = crypto.createDecipheriv("aes-256-gcm", toKeyBuffer(rawKey), Buffer.from(ivPart, "base64url"));
  decipher.setAuthTag(Buffer.from(tagPart, "base64url"));
  return Buffer.concat([decipher.update(Buffer.from(payloadPart, "base64url")), decipher.final()]).toString("utf8");
};

export const md5Hex = (value: string): string => crypto.createHash("md5").update(value).digest("hex");

export const sha256Hex = (value: string | Buffer): string => crypto.createHash("sha256").update(value).digest("hex");
