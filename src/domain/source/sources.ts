import type { PkgCacheConfig } from '../../utils/config.js';
import type { IndexVariant, SourceSelector } from '../types/packageIndex.js';

export interface IndexSource {
  selector: SourceSelector;
  variant: IndexVariant;
  /** Channel URL that redirects to the current release directory */
  versionUrl: string;
  indexUrl: string;
  /** Removed from the last redirect path segment to get the version string */
  stripPrefix: string;
}

const FLAKE_CHANNEL = 'nixpkgs-unstable';

type ChannelConfig = Pick<PkgCacheConfig, 'channelBase'>;

function channelBase(config: ChannelConfig): string {
  return config.channelBase.replace(/\/+$/, '');
}

/**
 * Map a raw OS release identifier to the channel name suffix. Only the first
 * five characters count (`23.05.1234.abcdef (Stoat)` → `23.05`); the rolling
 * release maps to `unstable`.
 */
export function normalizeRelease(rawRelease: string, rollingRelease: string): string {
  const release = rawRelease.slice(0, 5);
  return release === rollingRelease ? 'unstable' : release;
}

export function describeSource(
  selector: SourceSelector,
  release: string,
  config: ChannelConfig,
): IndexSource {
  const base = channelBase(config);

  switch (selector) {
    case 'system':
    case 'legacy': {
      const channel = `${base}/nixos-${release}`;
      return {
        selector,
        variant: selector === 'system' ? 'extended' : 'plain',
        versionUrl: channel,
        indexUrl: `${channel}/packages.json.br`,
        stripPrefix: 'nixos-',
      };
    }
    case 'flake':
      return {
        selector,
        variant: 'plain',
        versionUrl: `${base}/${FLAKE_CHANNEL}`,
        indexUrl: `${base}/${FLAKE_CHANNEL}/packages.json.br`,
        stripPrefix: 'nixpkgs-',
      };
  }
}

/**
 * The options document is published next to the system package index.
 */
export function describeOptionsSource(release: string, config: ChannelConfig) {
  const channel = `${channelBase(config)}/nixos-${release}`;
  return {
    versionUrl: channel,
    documentUrl: `${channel}/options.json.br`,
    stripPrefix: 'nixos-',
  };
}
