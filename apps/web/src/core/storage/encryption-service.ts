const IV_LENGTH = 12;

function bytesToBase64(bytes: Uint8Array): string {
  let binary = "";
  bytes.forEach((b) => {
    binary += String.fromCharCode(b);
  });
  return btoa(binary);
}

function base64ToBytes(value: string) {
  const binary = atob(value);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i += 1) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

export class DecryptionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecryptionError";
  }
}

/**
 * AES-GCM over Web Crypto. Output is `base64(iv).base64(ciphertext)` with a
 * fresh 12 byte IV per call.
 */
export class EncryptionService {
  private keyPromise: Promise<CryptoKey> | null = null;

  constructor(
    private readonly passphrase: string,
    private readonly crypto: Crypto = globalThis.crypto,
  ) {}

  async encrypt(plainText: string): Promise<string> {
    const key = await this.key();
    const iv = this.crypto.getRandomValues(new Uint8Array(IV_LENGTH));
    const cipher = await this.crypto.subtle.encrypt({ name: "AES-GCM", iv }, key, new TextEncoder().encode(plainText));
    return `${bytesToBase64(iv)}.${bytesToBase64(new Uint8Array(cipher))}`;
  }

  async decrypt(value: string): Promise<string> {
    const [ivPart, cipherPart, ...rest] = value.split(".");
    if (!ivPart || !cipherPart || rest.length > 0) {
      throw new DecryptionError("malformed encrypted value");
    }
    let iv: ReturnType<typeof base64ToBytes>;
    let cipher: ReturnType<typeof base64ToBytes>;
    try {
      iv = base64ToBytes(ivPart);
      cipher = base64ToBytes(cipherPart);
    } catch {
      throw new DecryptionError("encrypted value is not base64");
    }
    if (iv.length !== IV_LENGTH) {
      throw new DecryptionError("malformed encrypted value");
    }
    const key = await this.key();
    try {
      const plain = await this.crypto.subtle.decrypt({ name: "AES-GCM", iv }, key, cipher);
      return new TextDecoder().decode(plain);
    } catch {
      throw new DecryptionError("unable to decrypt value");
    }
  }

  private key(): Promise<CryptoKey> {
    if (!this.keyPromise) {
      this.keyPromise = this.deriveKey();
    }
    return this.keyPromise;
  }

  private async deriveKey(): Promise<CryptoKey> {
    const digest = await this.crypto.subtle.digest("SHA-256", new TextEncoder().encode(this.passphrase));
    return this.crypto.subtle.importKey("raw", digest, { name: "AES-GCM" }, false, ["encrypt", "decrypt"]);
  }
}
