import https from 'https';
import http from 'http';
import { buildDigestAuthorization, parseDigestChallenge } from './digest.js';
import { CameraError } from './errors.js';
import type { CameraAuth, CameraConfig, CapturedImage } from './types.js';

const MAX_REDIRECTS = 3;
const MAX_IMAGE_BYTES = 20 * 1024 * 1024;

interface RawResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
}

const NETWORK_CODES: Record<string, string> = {
  ECONNREFUSED: 'Connection refused (camera service not running?)',
  EHOSTUNREACH: 'Host unreachable',
  ENETUNREACH: 'Network unreachable',
  ENOTFOUND: 'Hostname not found',
  EAI_AGAIN: 'Hostname lookup failed',
  ECONNRESET: 'Connection dropped by camera',
};

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function classifyNetworkError(err: unknown): CameraError {
  if (err instanceof CameraError) return err;
  const code = errnoCode(err);
  const detail = err instanceof Error ? err.message : String(err);
  if (code === 'ECONNREFUSED') return new CameraError('connection_refused', NETWORK_CODES.ECONNREFUSED ?? detail);
  if (code === 'ETIMEDOUT' || code === 'ESOCKETTIMEDOUT') return new CameraError('timeout', 'Connection timed out');
  const known = code ? NETWORK_CODES[code] : undefined;
  return new CameraError('unreachable', known ?? detail);
}

function get(url: URL, headers: http.OutgoingHttpHeaders, deadline: number): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      reject(new CameraError('timeout', `Timeout fetching ${url.href}`));
      return;
    }

    // Set when we tear the request down ourselves, so the socket error that
    // follows is reported as the real cause
    let abortReason: CameraError | null = null;
    const fail = (err: unknown) => {
      clearTimeout(timer);
      reject(abortReason ?? classifyNetworkError(err));
    };
    const abort = (reason: CameraError) => {
      abortReason = reason;
      req.destroy(reason);
    };

    const onResponse = (res: http.IncomingMessage) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let complete = false;
      res.on('data', (c: Buffer) => {
        size += c.length;
        if (size > MAX_IMAGE_BYTES) {
          abort(new CameraError('invalid_content', `Response larger than ${MAX_IMAGE_BYTES} bytes`));
          return;
        }
        chunks.push(c);
      });
      res.on('end', () => {
        complete = true;
        clearTimeout(timer);
        resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks) });
      });
      res.on('error', fail);
      res.on('close', () => {
        if (!complete) fail(new Error('Connection closed before the response was complete'));
      });
    };

    // Cameras tend to ship self-signed certificates
    const req = url.protocol === 'https:'
      ? https.get(url, { headers, rejectUnauthorized: false }, onResponse)
      : http.get(url, { headers }, onResponse);

    const timer = setTimeout(() => {
      abort(new CameraError('timeout', `Timeout fetching ${url.href}`));
    }, remaining);

    req.on('error', fail);
  });
}

function withoutAuthorization(headers: http.OutgoingHttpHeaders): http.OutgoingHttpHeaders {
  return Object.fromEntries(
    Object.entries(headers).filter(([name]) => name.toLowerCase() !== 'authorization'),
  );
}

async function getFollowingRedirects(
  url: URL,
  headers: http.OutgoingHttpHeaders,
  deadline: number,
): Promise<{ url: URL; res: RawResponse }> {
  let current = url;
  let sent = headers;
  for (let hop = 0; ; hop++) {
    const res = await get(current, sent, deadline);
    const location = res.headers.location;
    if (res.status < 300 || res.status >= 400 || !location || hop >= MAX_REDIRECTS) {
      return { url: current, res };
    }
    current = new URL(location, current);
    // Credentials only ever go to the origin they were configured for
    if (current.origin !== url.origin) sent = withoutAuthorization(sent);
  }
}

export function basicAuthorization(username: string, password: string): string {
  return 'Basic ' + Buffer.from(`${username}:${password}`).toString('base64');
}

async function fetchWithAuth(url: URL, auth: CameraAuth, deadline: number): Promise<RawResponse> {
  switch (auth.type) {
    case 'none':
      return (await getFollowingRedirects(url, {}, deadline)).res;
    case 'basic':
      return (await getFollowingRedirects(url, {
        Authorization: basicAuthorization(auth.username, auth.password),
      }, deadline)).res;
    case 'digest': {
      // Challenge/response is one attempt: ask, then answer the nonce once
      const first = await getFollowingRedirects(url, {}, deadline);
      if (first.res.status !== 401) return first.res;
      const challenge = parseDigestChallenge(first.res.headers['www-authenticate']);
      if (!challenge) {
        throw new CameraError('auth_failed', 'Camera did not offer a Digest challenge', 401);
      }
      const authorization = buildDigestAuthorization(challenge, {
        username: auth.username,
        password: auth.password,
        method: 'GET',
        uri: first.url.pathname + first.url.search,
      });
      return get(first.url, { Authorization: authorization }, deadline);
    }
    default: {
      const unknown: never = auth;
      throw new Error(`Unknown auth type: ${JSON.stringify(unknown)}`);
    }
  }
}

const SIGNATURES: Array<{ contentType: string; extension: string; test: (b: Buffer) => boolean }> = [
  { contentType: 'image/jpeg', extension: 'jpg', test: (b) => b.length > 3 && b[0] === 0xff && b[1] === 0xd8 && b[2] === 0xff },
  { contentType: 'image/png', extension: 'png', test: (b) => b.length > 8 && b.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])) },
  { contentType: 'image/gif', extension: 'gif', test: (b) => b.length > 6 && /^GIF8[79]a$/.test(b.subarray(0, 6).toString('latin1')) },
  { contentType: 'image/webp', extension: 'webp', test: (b) => b.length > 12 && b.subarray(0, 4).toString('latin1') === 'RIFF' && b.subarray(8, 12).toString('latin1') === 'WEBP' },
];

export function detectImage(data: Buffer): { contentType: string; extension: string } | null {
  const match = SIGNATURES.find((s) => s.test(data));
  return match ? { contentType: match.contentType, extension: match.extension } : null;
}

/**
 * One authenticated GET against the snapshot URL.
 *
 * Rejects with a classified CameraError. There is no retry here: the
 * scheduler decides what happens next so every attempt is counted.
 */
export async function fetchSnapshot(camera: CameraConfig): Promise<CapturedImage> {
  if (!camera.snapshot_url) {
    throw new CameraError('no_url', 'No camera URL configured');
  }

  let url: URL;
  try {
    url = new URL(camera.snapshot_url);
  } catch {
    throw new CameraError('unreachable', `Invalid camera URL: ${camera.snapshot_url}`);
  }

  const deadline = Date.now() + camera.timeout_seconds * 1000;
  const res = await fetchWithAuth(url, camera.auth, deadline);

  if (res.status === 401 || res.status === 403) {
    throw new CameraError('auth_failed', `Camera rejected credentials (HTTP ${res.status})`, res.status);
  }
  if (res.status < 200 || res.status >= 300) {
    throw new CameraError('http_error', `Camera responded with HTTP ${res.status}`, res.status);
  }

  const kind = detectImage(res.body);
  if (!kind) {
    const got = res.headers['content-type'] ?? 'unknown type';
    throw new CameraError('invalid_content', `Response is not an image (${got}, ${res.body.length} bytes)`);
  }

  return { data: res.body, ...kind };
}

export type SnapshotFetcher = typeof fetchSnapshot;
