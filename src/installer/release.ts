/**
 * Release Resolution
 * Maps the running platform to its "latest" release asset on GitHub
 */

import { z } from 'zod';
import { getLogger } from '../infra/logger';
import { PlatformSchema, type Config, type Platform, type ReleaseAsset } from '../core/types';

// ---------------------------------------------------------------------------
// Platform Detection
// ---------------------------------------------------------------------------

/** Throws on platforms the application is not built for. */
export function detectPlatform(platform: string = process.platform): Platform {
  const parsed = PlatformSchema.safeParse(platform);
  if (!parsed.success) {
    throw new Error(`Unsupported platform: ${platform}`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Asset URL
// ---------------------------------------------------------------------------

const GITHUB_BASE = 'https://github.com';
const GITHUB_API = 'https://api.github.com';

export function latestDownloadUrl(repo: string, fileName: string): string {
  return `${GITHUB_BASE}/${repo}/releases/latest/download/${encodeURIComponent(fileName)}`;
}

export function resolveReleaseAsset(config: Config, platform: Platform): ReleaseAsset {
  const fileName = config.assets[platform];
  return {
    url: latestDownloadUrl(config.applicationRepo, fileName),
    fileName,
    size: 0,
  };
}

// ---------------------------------------------------------------------------
// Release Metadata (GitHub API)
// ---------------------------------------------------------------------------

const GithubReleaseSchema = z.object({
  tag_name: z.string(),
  name: z.string().nullable(),
  published_at: z.string().nullable(),
  assets: z.array(z.object({
    name: z.string(),
    size: z.number(),
    browser_download_url: z.string(),
  })),
});

export interface ReleaseInfo {
  tagName: string;
  name: string;
  publishedAt?: string;
  /** Size of the named asset, when the release carries it */
  assetSize?: number;
}

export interface FetchReleaseOptions {
  fetchFn?: typeof fetch;
  apiBase?: string;
  timeoutMs?: number;
}

/**
 * Look up the latest release for display purposes.
 * Never throws: a failed lookup is logged and yields null.
 */
export async function fetchLatestRelease(
  repo: string,
  assetName: string,
  options: FetchReleaseOptions = {}
): Promise<ReleaseInfo | null> {
  const log = getLogger().child('release');
  const fetchFn = options.fetchFn ?? fetch;
  const url = `${options.apiBase ?? GITHUB_API}/repos/${repo}/releases/latest`;

  try {
    const response = await fetchFn(url, {
      headers: { Accept: 'application/vnd.github+json' },
      signal: AbortSignal.timeout(options.timeoutMs ?? 10_000),
    });
    if (!response.ok) {
      log.warn('Release lookup failed', { url, status: response.status });
      return null;
    }

    const parsed = GithubReleaseSchema.safeParse(await response.json());
    if (!parsed.success) {
      log.warn('Unexpected release payload', { url });
      return null;
    }

    const release = parsed.data;
    const asset = release.assets.find((a) => a.name === assetName);
    return {
      tagName: release.tag_name,
      name: release.name ?? release.tag_name,
      publishedAt: release.published_at ?? undefined,
      assetSize: asset?.size,
    };
  } catch (err) {
    log.warn('Release lookup error', { url, error: err instanceof Error ? err.message : String(err) });
    return null;
  }
}
