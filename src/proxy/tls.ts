import { createPrivateKey, type KeyObject, X509Certificate } from "node:crypto";
import { readFileSync } from "node:fs";
import type { SecureVersion, TlsOptions } from "node:tls";
import { TlsMaterialError } from "./errors.js";
import type { TlsListenerConfig } from "./types.js";

export const MIN_TLS_VERSION: SecureVersion = "TLSv1.2";
export const MAX_TLS_VERSION: SecureVersion = "TLSv1.3";

/** PEM certificate chain and private key, validated as a matching pair. */
export interface TlsMaterial {
  cert: Buffer;
  key: Buffer;
  /** Leaf certificate subject, for the startup log. */
  subject: string;
  validTo: string;
}

function readPem(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (err) {
    const code = err instanceof Error && "code" in err ? String(err.code) : "unreadable";
    throw new TlsMaterialError(path, code);
  }
}

function parseCertificate(pem: Buffer, path: string): X509Certificate {
  try {
    return new X509Certificate(pem);
  } catch {
    throw new TlsMaterialError(path, "not a PEM certificate");
  }
}

function parseKey(pem: Buffer, path: string): KeyObject {
  try {
    return createPrivateKey(pem);
  } catch {
    throw new TlsMaterialError(path, "not a PEM private key");
  }
}

/**
 * Read the certificate chain and key once, at startup. A missing file, an
 * unparseable file, or a key that does not belong to the leaf certificate is
 * fatal: the proxy must not start without usable TLS material.
 */
export function loadTlsMaterial(certPath: string, keyPath: string): TlsMaterial {
  const cert = readPem(certPath);
  const key = readPem(keyPath);

  const leaf = parseCertificate(cert, certPath);
  const privateKey = parseKey(key, keyPath);
  if (!leaf.checkPrivateKey(privateKey)) {
    throw new TlsMaterialError(keyPath, `key does not match certificate ${certPath}`);
  }

  return { cert, key, subject: leaf.subject, validTo: leaf.validTo };
}

/** Server options enforcing TLS 1.2-1.3 and the server's cipher order. */
export function buildTlsServerOptions(
  material: TlsMaterial,
  config: Pick<TlsListenerConfig, "ciphers" | "handshakeTimeoutMs">,
): TlsOptions {
  return {
    cert: material.cert,
    key: material.key,
    minVersion: MIN_TLS_VERSION,
    maxVersion: MAX_TLS_VERSION,
    ciphers: config.ciphers,
    honorCipherOrder: true,
    handshakeTimeout: config.handshakeTimeoutMs,
  };
}
