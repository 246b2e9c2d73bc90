export const DEFAULT_PORT = 3000;
export const DEFAULT_LMSTUDIO_URL = 'http://localhost:1234';
export const DEFAULT_UPSTREAM_TIMEOUT_MS = 300_000;

export const LOOPBACK_HOST = '127.0.0.1';
export const ALL_INTERFACES_HOST = '0.0.0.0';

export const MAX_BODY_SIZE = '50mb';

export const CONTENT_TYPE = {
  JSON: 'application/json',
  EVENT_STREAM: 'text/event-stream',
} as const;

// Headers describing bytes the proxy no longer sends verbatim
export const BODY_FRAMING_HEADERS = ['content-length', 'content-encoding', 'transfer-encoding'] as const;

// Recomputed or renegotiated by the outbound client. undici refuses the
// hop-by-hop ones outright.
export const OUTBOUND_DROPPED_HEADERS = [
  'host',
  'connection',
  'accept-encoding',
  'keep-alive',
  'upgrade',
  'expect',
] as const;

export const ErrorCodes = {
  CLIENT_BODY_READ_ERROR: 'CLIENT_BODY_READ_ERROR',
  UPSTREAM_UNREACHABLE: 'UPSTREAM_UNREACHABLE',
  UPSTREAM_BODY_READ_ERROR: 'UPSTREAM_BODY_READ_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
