import path from 'node:path';

import type { SourceSelector } from '../types/packageIndex.js';

export const OPTIONS_ARTIFACT = 'options';

export interface ArtifactPaths {
  artifactPath: string;
  markerPath: string;
}

export function storePaths(cacheDir: string, selector: SourceSelector): ArtifactPaths {
  return {
    artifactPath: path.join(cacheDir, `${selector}.db`),
    markerPath: path.join(cacheDir, `${selector}.ver`),
  };
}

export function optionsPaths(cacheDir: string): ArtifactPaths {
  return {
    artifactPath: path.join(cacheDir, `${OPTIONS_ARTIFACT}.json`),
    markerPath: path.join(cacheDir, `${OPTIONS_ARTIFACT}.ver`),
  };
}
