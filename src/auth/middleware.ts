import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { DEFAULT_TIMEOUT_MS, TEMPO_API_BASE } from '../clients/tempo.js';
import type { TempoConfig } from '../types/index.js';

export const SERVER_NAME = 'tempoai';
export const SERVER_VERSION = '1.0.0';
export const USER_AGENT = `tempoai-mcp-server/${SERVER_VERSION}`;

export type TransportMode = 'stdio' | 'http';

export interface AppConfig {
  port: number;
  tempo: TempoConfig;
}

/**
 * Validate the MCP authentication token from the Authorization header or
 * query parameter. Only the Streamable HTTP transport uses this.
 * Supports:
 * - Authorization: Bearer <token> (preferred)
 * - ?token=<token> (clients that can't set headers)
 */
export function validateToken(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const expectedToken = process.env.MCP_AUTH_TOKEN;

  if (!expectedToken) {
    console.error('MCP_AUTH_TOKEN environment variable not set');
    res.status(500).json({ error: 'Server configuration error' });
    return;
  }

  let providedToken: string | undefined;
  const authHeader = req.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    providedToken = authHeader.slice(7);
  }

  if (!providedToken && typeof req.query.token === 'string') {
    providedToken = req.query.token;
  }

  if (!providedToken) {
    res.status(401).json({ error: 'Authentication token required' });
    return;
  }

  if (!secureCompare(providedToken, expectedToken)) {
    res.status(403).json({ error: 'Invalid authentication token' });
    return;
  }

  next();
}

/**
 * Constant-time string comparison.
 */
function secureCompare(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) {
    return false;
  }
  return timingSafeEqual(left, right);
}

/**
 * Check the environment for the given transport.
 * Throws if any required variable is missing.
 */
export function validateEnvironment(mode: TransportMode): void {
  const required = mode === 'http' ? ['MCP_AUTH_TOKEN'] : [];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(', ')}`
    );
  }

  // Not fatal: every tool also accepts api_key per call
  if (!process.env.API_KEY) {
    console.error('API_KEY is not set; tool calls must pass api_key');
  }
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Get configuration from environment variables. Read once at startup; the
 * API key is not re-read afterwards.
 */
export function getConfig(): AppConfig {
  return {
    port: parsePositiveInt(process.env.PORT, 3000),
    tempo: {
      apiKey: process.env.API_KEY?.trim() ?? '',
      baseUrl: process.env.TEMPO_AI_API_BASE_URL || TEMPO_API_BASE,
      userAgent: USER_AGENT,
      timeoutMs: parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    },
  };
}
