import crypto from 'crypto';

export interface DigestChallenge {
  realm: string;
  nonce: string;
  qop?: string;
  opaque?: string;
  algorithm?: string;
}

export interface DigestRequest {
  username: string;
  password: string;
  method: string;
  uri: string;
  cnonce?: string;
  nc?: number;
}

// Picks the Digest challenge out of a WWW-Authenticate header; null if the
// server offers something else (e.g. only Basic).
export function parseDigestChallenge(header: string | string[] | undefined): DigestChallenge | null {
  const values = Array.isArray(header) ? header : header ? [header] : [];
  const digest = values.find((v) => /^\s*digest\s/i.test(v));
  if (!digest) return null;

  const params: Record<string, string> = {};
  const re = /(\w+)\s*=\s*(?:"((?:[^"\\]|\\.)*)"|([^,\s]*))/g;
  const body = digest.replace(/^\s*digest\s+/i, '');
  for (let m = re.exec(body); m; m = re.exec(body)) {
    const [, key = '', quoted, bare] = m;
    params[key.toLowerCase()] = quoted !== undefined ? quoted.replace(/\\(.)/g, '$1') : bare ?? '';
  }

  const { realm, nonce } = params;
  if (realm === undefined || !nonce) return null;
  return { realm, nonce, qop: params.qop, opaque: params.opaque, algorithm: params.algorithm };
}

function hashFor(algorithm: string): (input: string) => string {
  const base = algorithm.replace(/-sess$/i, '').toUpperCase();
  const name = base === 'SHA-256' ? 'sha256' : 'md5';
  return (input) => crypto.createHash(name).update(input).digest('hex');
}

export function buildDigestAuthorization(challenge: DigestChallenge, req: DigestRequest): string {
  const algorithm = challenge.algorithm ?? 'MD5';
  const hash = hashFor(algorithm);
  const cnonce = req.cnonce ?? crypto.randomBytes(8).toString('hex');
  const nc = (req.nc ?? 1).toString(16).padStart(8, '0');

  // Only qop=auth is supported; auth-int would need the request body hashed
  const offered = (challenge.qop ?? '').split(',').map((q) => q.trim());
  const qop = offered.includes('auth') ? 'auth' : undefined;

  let ha1 = hash(`${req.username}:${challenge.realm}:${req.password}`);
  if (/-sess$/i.test(algorithm)) {
    ha1 = hash(`${ha1}:${challenge.nonce}:${cnonce}`);
  }
  const ha2 = hash(`${req.method}:${req.uri}`);
  const response = qop
    ? hash(`${ha1}:${challenge.nonce}:${nc}:${cnonce}:${qop}:${ha2}`)
    : hash(`${ha1}:${challenge.nonce}:${ha2}`);

  const fields = [
    `username="${req.username}"`,
    `realm="${challenge.realm}"`,
    `nonce="${challenge.nonce}"`,
    `uri="${req.uri}"`,
    `algorithm=${algorithm}`,
    `response="${response}"`,
  ];
  if (qop) fields.push(`qop=${qop}`, `nc=${nc}`, `cnonce="${cnonce}"`);
  if (challenge.opaque !== undefined) fields.push(`opaque="${challenge.opaque}"`);

  return `Digest ${fields.join(', ')}`;
}
