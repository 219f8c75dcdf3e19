import http from 'http';
import https from 'https';
import { SocksProxyAgent } from 'socks-proxy-agent';

export const ENABLE_LOGGING = process.env.EDGEMETER_DEBUG === '1';

// Routes every engine HTTP client through a SOCKS proxy, e.g. socks5h://127.0.0.1:9050
export const SOCKS_PROXY = process.env.EDGEMETER_SOCKS_PROXY || '';

export const FAST_TOKEN = process.env.EDGEMETER_FAST_TOKEN || '';

export const SERVER_HOST = '127.0.0.1';
export const SERVER_PORT = Number(process.env.EDGEMETER_PORT) || 3000;
export const SERVER_URL = `http://${SERVER_HOST}:${SERVER_PORT}`;

// Orchestrator timing
export const PHASE_DURATION_SECONDS = 15;
export const UI_TICK_MS = 200;
export const LATENCY_PAUSE_MS = 400;
export const INTER_PHASE_PAUSE_MS = 500;

// Meter tuning
export const RING_SIZE = 64; // power of two
export const WINDOW_TICKS = 15; // 15 x 200 ms = 3 s

// Shared last-resort upload target for every engine's tier list
export const FALLBACK_UPLOAD_URL = 'https://speed.cloudflare.com/__up';

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 Chrome/120.0.0.0 Safari/537.36';

export interface AgentOptions {
  maxSockets?: number;
  keepAlive?: boolean;
}

// One agent per protocol; with a SOCKS proxy configured both protocols go through it.
export function createAgent(protocol: string, options: AgentOptions = {}): http.Agent {
  const keepAlive = options.keepAlive ?? true;
  const maxSockets = options.maxSockets ?? Infinity;
  if (SOCKS_PROXY) {
    return new SocksProxyAgent(SOCKS_PROXY, { keepAlive, maxSockets });
  }
  if (protocol.startsWith('https')) {
    return new https.Agent({ keepAlive, maxSockets, rejectUnauthorized: false });
  }
  return new http.Agent({ keepAlive, maxSockets });
}
