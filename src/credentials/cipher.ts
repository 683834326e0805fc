import { createCipheriv, createDecipheriv, createHash, createHmac, randomBytes } from "node:crypto";
import { ConfigError } from "../errors.js";

const VERSION = "v1";
const IV_BYTES = 12;
const TAG_BYTES = 16;

/**
 * AES-256-GCM for secrets at rest and HMAC-SHA256 for token lookup hashes.
 * Both keys derive from one master secret. Blobs read `v1:<base64url>` where
 * the payload is iv | auth tag | ciphertext.
 */
export class SecretCipher {
  private readonly key: Buffer;
  private readonly macKey: Buffer;

  constructor(masterSecret: string) {
    if (!masterSecret) throw new ConfigError("An encryption key is required");
    this.key = createHash("sha256").update(`enc:${masterSecret}`).digest();
    this.macKey = createHash("sha256").update(`mac:${masterSecret}`).digest();
  }

  encryptSecret(plain: string): string {
    const iv = randomBytes(IV_BYTES);
    const cipher = createCipheriv("aes-256-gcm", this.key, iv);
    const body = Buffer.concat([cipher.update(plain, "utf8"), cipher.final()]);
    const payload = Buffer.concat([iv, cipher.getAuthTag(), body]);
    return `${VERSION}:${payload.toString("base64url")}`;
  }

  decryptSecret(blob: string): string {
    const [version, encoded] = blob.split(":", 2);
    if (version !== VERSION || !encoded) {
      throw new ConfigError("Stored secret has an unknown format");
    }
    const payload = Buffer.from(encoded, "base64url");
    if (payload.length < IV_BYTES + TAG_BYTES) {
      throw new ConfigError("Stored secret is truncated");
    }
    const iv = payload.subarray(0, IV_BYTES);
    const tag = payload.subarray(IV_BYTES, IV_BYTES + TAG_BYTES);
    const decipher = createDecipheriv("aes-256-gcm", this.key, iv);
    decipher.setAuthTag(tag);
    try {
      return Buffer.concat([decipher.update(payload.subarray(IV_BYTES + TAG_BYTES)), decipher.final()]).toString("utf8");
    } catch (error) {
      throw new ConfigError(`Stored secret could not be decrypted: ${error instanceof Error ? error.message : "unknown"}`);
    }
  }

  lookupHash(token: string): string {
    return createHmac("sha256", this.macKey).update(token).digest("hex");
  }
}
