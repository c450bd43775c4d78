import type { HexColor } from '../common/types.js';
import { DEFAULT_PALETTE } from './palette.js';

export const APP_CONFIG = Symbol('APP_CONFIG');

export interface AppConfig {
  githubToken: string | null;    // session token until a user enters one
  githubApiUrl: string;
  githubHost: string;            // host accepted in repository URLs
  releasesPageSize: number;      // 1..100, GitHub caps per_page at 100
  palette: readonly HexColor[];
  port: number;
  host: string;
}

const HEX_COLOR_RE = /^#[0-9a-fA-F]{6}$/;

function intFromEnv(raw: string | undefined, name: string, fallback: number, min: number, max: number) {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
}

function paletteFromEnv(raw: string | undefined): readonly HexColor[] {
  if (raw === undefined || raw.trim() === '') return DEFAULT_PALETTE;
  const colors = raw.split(',').map((c) => c.trim()).filter(Boolean);
  if (colors.length === 0) throw new Error('TIMELINE_PALETTE must list at least one color');
  const bad = colors.find((c) => !HEX_COLOR_RE.test(c));
  if (bad) throw new Error(`TIMELINE_PALETTE entry "${bad}" is not a #RRGGBB color`);
  return colors;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const token = env.GITHUB_TOKEN?.trim();
  return {
    githubToken: token ? token : null,
    githubApiUrl: (env.GITHUB_API_URL?.trim() || 'https://api.github.com').replace(/\/+$/, ''),
    githubHost: (env.GITHUB_HOST?.trim() || 'github.com').toLowerCase(),
    releasesPageSize: intFromEnv(env.RELEASES_PAGE_SIZE, 'RELEASES_PAGE_SIZE', 100, 1, 100),
    palette: paletteFromEnv(env.TIMELINE_PALETTE),
    port: intFromEnv(env.PORT, 'PORT', 3000, 1, 65535),
    host: env.HOST?.trim() || '0.0.0.0',
  };
}
